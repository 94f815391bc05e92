/**
 * Amadeus Self-Service client: OAuth2 client-credentials tokens, reused
 * until shortly before they expire. Concurrent callers share one token
 * request; it runs under its own signal and is aborted only once every
 * caller waiting on it has gone.
 */

import { z } from 'zod';
import { parsePayload, requestJson } from './base-provider';
import { ProviderHttpError } from './errors';
import { waitFor } from '../utils/deadline';
import type { FetchImpl } from './types';

export interface AmadeusCredentials {
  apiKey: string;
  apiSecret: string;
  testMode: boolean;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
});

/** Refresh this long before the token actually expires. */
const TOKEN_EXPIRY_MARGIN_MS = 60_000;

export const AMADEUS_TEST_URL = 'https://test.api.amadeus.com';
export const AMADEUS_PRODUCTION_URL = 'https://api.amadeus.com';

interface PendingToken {
  promise: Promise<string>;
  controller: AbortController;
  waiters: number;
}

export class AmadeusClient {
  private token: { value: string; expiresAt: number } | null = null;
  private tokenRequest: PendingToken | null = null;

  constructor(
    private readonly credentials: AmadeusCredentials,
    private readonly fetchImpl: FetchImpl = fetch,
    private readonly now: () => number = Date.now
  ) {}

  get baseUrl(): string {
    return this.credentials.testMode ? AMADEUS_TEST_URL : AMADEUS_PRODUCTION_URL;
  }

  async accessToken(signal: AbortSignal): Promise<string> {
    if (this.token && this.token.expiresAt > this.now()) return this.token.value;
    signal.throwIfAborted();

    const pending = this.tokenRequest ?? this.startTokenRequest();
    pending.waiters++;
    try {
      return await waitFor(pending.promise, signal);
    } finally {
      pending.waiters--;
      if (pending.waiters === 0 && this.tokenRequest === pending) {
        this.tokenRequest = null;
        pending.controller.abort();
      }
    }
  }

  private startTokenRequest(): PendingToken {
    const controller = new AbortController();
    const pending: PendingToken = { promise: this.requestToken(controller.signal), controller, waiters: 0 };
    const release = (): void => {
      if (this.tokenRequest === pending) this.tokenRequest = null;
    };
    pending.promise.then(release, release);
    this.tokenRequest = pending;
    return pending;
  }

  private async requestToken(signal: AbortSignal): Promise<string> {
    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.credentials.apiKey,
      client_secret: this.credentials.apiSecret,
    });
    const data = await requestJson(
      this.fetchImpl,
      `${this.baseUrl}/v1/security/oauth2/token`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: body.toString(),
      },
      signal
    );
    const parsed = parsePayload('amadeus', TokenResponseSchema, data);
    this.token = {
      value: parsed.access_token,
      expiresAt: this.now() + parsed.expires_in * 1000 - TOKEN_EXPIRY_MARGIN_MS,
    };
    return parsed.access_token;
  }

  /**
   * Authenticated GET. A 401 drops the cached token so the next attempt
   * authenticates again.
   */
  async get(path: string, params: Record<string, string>, signal: AbortSignal): Promise<unknown> {
    const token = await this.accessToken(signal);
    const url = `${this.baseUrl}${path}?${new URLSearchParams(params).toString()}`;
    try {
      return await requestJson(this.fetchImpl, url, { headers: { Authorization: `Bearer ${token}` } }, signal);
    } catch (error) {
      if (error instanceof ProviderHttpError && error.status === 401) this.token = null;
      throw error;
    }
  }
}
