#!/usr/bin/env node
/**
 * Trip Planner CLI
 *
 * Usage:
 *   npx tsx src/cli/plan-trip.ts request.json
 *   npx tsx src/cli/plan-trip.ts request.json --format json
 *
 * After compilation:
 *   node dist/src/cli/plan-trip.js [options] <request.json>
 */

import * as fs from 'fs';
import * as path from 'path';
import { ItineraryPlanner } from '../engine/planner';
import type { PlannedTrip, PlanningFailure } from '../engine/types';

// ============================================================================
// CLI Argument Parsing
// ============================================================================

interface CliArgs {
  input?: string;
  format: 'text' | 'json';
  help: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { format: 'text', help: false };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case '--help':
      case '-h':
        args.help = true;
        break;

      case '--format':
      case '-f': {
        const format = argv[++i];
        if (format === 'json' || format === 'text') {
          args.format = format;
        } else {
          throw new Error(`Unknown format: ${format}`);
        }
        break;
      }

      default:
        if (arg.startsWith('-')) {
          throw new Error(`Unknown option: ${arg}`);
        }
        args.input = arg;
    }
  }

  return args;
}

function printHelp(): void {
  console.log(`
Trip Planner - Build a budgeted day-by-day itinerary from a trip request

USAGE:
  npx tsx src/cli/plan-trip.ts [OPTIONS] <request.json>

OPTIONS:
  -f, --format <fmt>   Output format: text (default) or json
  -h, --help           Show this help

ENVIRONMENT:
  AMADEUS_API_KEY, AMADEUS_API_SECRET   Flight and hotel search
  AMADEUS_TEST_MODE                     Use the Amadeus test host (default: true)
  GOOGLE_PLACES_KEY                     Attraction and restaurant search
  OPENAI_API_KEY, OPENAI_MODEL          Narration (template text without a key)
`);
}

// ============================================================================
// Output Formatting
// ============================================================================

export function formatTripText(trip: PlannedTrip): string {
  const { itinerary, narrative } = trip;
  const lines: string[] = [];

  lines.push('='.repeat(60));
  lines.push(narrative.summary);
  lines.push('='.repeat(60));
  if (itinerary.flight) {
    lines.push(`Flight:  ${itinerary.flight.name} (${itinerary.flight.price.amount.toFixed(2)})`);
  }
  if (itinerary.lodging) {
    lines.push(`Lodging: ${itinerary.lodging.name} (${itinerary.lodging.price.amount.toFixed(2)})`);
  }
  lines.push(`Total:   ${itinerary.totalCost.amount.toFixed(2)} ${itinerary.totalCost.currency}`);

  for (const day of itinerary.days) {
    lines.push('');
    lines.push(`Day ${day.dayIndex + 1} (${day.date})${day.unplanned ? ' - unplanned' : ''}`);
    lines.push('-'.repeat(60));
    const text = narrative.days.find((d) => d.dayIndex === day.dayIndex)?.text ?? '';
    for (const line of text.split('\n')) lines.push(`  ${line}`);
  }

  const { notices, warnings } = itinerary.metadata;
  if (notices.length > 0 || warnings.length > 0) {
    lines.push('');
    lines.push('NOTES:');
    for (const notice of notices) lines.push(`  ⚠ [${notice.kind}] ${notice.message}`);
    for (const warning of warnings) lines.push(`  ⚠ ${warning}`);
  }

  return lines.join('\n');
}

export function formatFailureText(failure: PlanningFailure): string {
  return `✗ ${failure.kind}: ${failure.message}`;
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<number> {
  const args = parseArgs(process.argv);

  if (args.help || !args.input) {
    printHelp();
    return args.help ? 0 : 1;
  }

  const requestPath = path.resolve(process.cwd(), args.input);
  const request: unknown = JSON.parse(fs.readFileSync(requestPath, 'utf-8'));

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const planner = ItineraryPlanner.fromEnvironment();
  const result = await planner.plan(request, { signal: controller.signal });

  if (args.format === 'json') {
    console.log(JSON.stringify(result.ok ? result.value : result.error, null, 2));
  } else {
    console.log(result.ok ? formatTripText(result.value) : formatFailureText(result.error));
  }

  return result.ok ? 0 : 1;
}

if (require.main === module) {
  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  );
}
