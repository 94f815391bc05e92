import { describe, it, expect } from 'vitest';
import { estimateTravelMinutes, haversineKm } from '../../src/planning/travel-time';
import { roundMoney, floorMoney, sumAmounts, toCents } from '../../src/planning/money';
import { testConfig } from '../helpers/fixtures';

const travel = testConfig().schedule.travel;

describe('estimateTravelMinutes', () => {
  it('is zero for the same point', () => {
    expect(estimateTravelMinutes({ lat: 34.69, lon: 135.5 }, { lat: 34.69, lon: 135.5 }, travel)).toBe(0);
  });

  it('adds overhead to distance and rounds up', () => {
    expect(estimateTravelMinutes({ lat: 0, lon: 0 }, { lat: 0.01, lon: 0 }, travel)).toBe(10);
    expect(estimateTravelMinutes({ lat: 0, lon: 0 }, { lat: 1, lon: 0 }, travel)).toBe(450);
  });

  it('uses the fixed estimate when a location is unknown', () => {
    expect(estimateTravelMinutes(undefined, { lat: 0, lon: 0 }, travel)).toBe(20);
    expect(estimateTravelMinutes({ lat: 0, lon: 0 }, undefined, travel)).toBe(20);
  });

  it('grows with distance', () => {
    const from = { lat: 35, lon: 139 };
    const near = estimateTravelMinutes(from, { lat: 35.01, lon: 139 }, travel);
    const far = estimateTravelMinutes(from, { lat: 35.1, lon: 139 }, travel);
    expect(far).toBeGreaterThan(near);
    expect(haversineKm(from, { lat: 35.1, lon: 139 })).toBeCloseTo(11.12, 1);
  });
});

describe('money', () => {
  it('sums in cents', () => {
    expect(sumAmounts([0.1, 0.2])).toBe(0.3);
    expect(toCents(19.99)).toBe(1999);
    expect(roundMoney(12.345678)).toBe(12.35);
  });

  it('floors to the cent', () => {
    expect(floorMoney(33.3333)).toBe(33.33);
    expect(floorMoney(673.75)).toBe(673.75);
  });
});
