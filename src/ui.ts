import type { BusinessRecord } from './types';

export type Logger = {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

/** `[scope]`-prefixed console output; `quiet` silences everything but errors. */
export const createLogger = (scope: string, quiet = false): Logger => ({
  info: (message) => {
    if (!quiet) console.log(`[${scope}] ${message}`);
  },
  warn: (message) => {
    if (!quiet) console.warn(`[${scope}] ${message}`);
  },
  error: (message) => {
    console.error(`[${scope}] ${message}`);
  },
});

export type HarvestSummary = {
  total: number;
  withPhone: number;
  withEmail: number;
  withAddress: number;
  withWebsite: number;
  withAllContact: number;
  categories: Array<{ category: string; count: number }>;
};

export function summarize(records: readonly BusinessRecord[]): HarvestSummary {
  const counts = new Map<string, number>();
  for (const r of records) {
    if (r.category) counts.set(r.category, (counts.get(r.category) ?? 0) + 1);
  }

  return {
    total: records.length,
    withPhone: records.filter((r) => r.phone).length,
    withEmail: records.filter((r) => r.email).length,
    withAddress: records.filter((r) => r.address).length,
    withWebsite: records.filter((r) => r.website).length,
    withAllContact: records.filter((r) => r.phone && r.email && r.address).length,
    categories: Array.from(counts, ([category, count]) => ({ category, count })).sort(
      (a, b) => b.count - a.count || a.category.localeCompare(b.category)
    ),
  };
}

export function formatOutcome(record: BusinessRecord): string {
  const flag = (v: string) => (v ? 'yes' : 'no');
  return `${record.name.slice(0, 40)} (phone: ${flag(record.phone)}, email: ${flag(record.email)}, address: ${flag(record.address)})`;
}

export function printSummary(summary: HarvestSummary, files: readonly string[] = []): void {
  const rule = '='.repeat(60);
  console.log(`\n${rule}`);
  console.log('HARVEST SUMMARY');
  console.log(rule);
  console.log(`Total businesses:   ${summary.total}`);
  console.log(`  with phone:       ${summary.withPhone}`);
  console.log(`  with email:       ${summary.withEmail}`);
  console.log(`  with address:     ${summary.withAddress}`);
  console.log(`  with website:     ${summary.withWebsite}`);
  console.log(`  with all contact: ${summary.withAllContact}`);

  if (summary.categories.length) {
    console.log('\nCategories:');
    for (const { category, count } of summary.categories) {
      console.log(`  - ${category}: ${count}`);
    }
  }

  if (files.length) {
    console.log('\nFiles written:');
    for (const file of files) console.log(`  - ${file}`);
  }
  console.log(rule);
}
