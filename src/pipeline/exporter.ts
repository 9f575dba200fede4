import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { Parser } from 'json2csv';

import { PersistenceError, errorMessage } from '../errors';
import { EXPORT_COLUMNS, type BusinessRecord, type ExportRow, type OutputFormat } from '../types';

export type OutputOptions = {
  dir: string;
  basename: string;
  formats: readonly OutputFormat[];
  /** Also write one view per distinct category value. */
  byCategory: boolean;
};

export type OutputView = {
  name: string;
  records: BusinessRecord[];
};

/** Writes every view of `records`; resolves to the paths written. */
export type OutputWriter = (
  records: readonly BusinessRecord[],
  opts?: { partial?: boolean }
) => Promise<string[]>;

export const toRow = (r: BusinessRecord): ExportRow => ({
  Name: r.name,
  Category: r.category,
  Description: r.description,
  Address: r.address,
  Phone: r.phone,
  Email: r.email,
  Website: r.website,
  Source_URL: r.sourceUrl,
});

export function toCsv(records: readonly BusinessRecord[]): string {
  const parser = new Parser<ExportRow>({
    fields: EXPORT_COLUMNS.map((c) => c.label),
    eol: '\n',
  });
  return parser.parse(records.map(toRow));
}

export function toJson(records: readonly BusinessRecord[]): string {
  return JSON.stringify(records.map(toRow), null, 2);
}

export const hasContact = (r: BusinessRecord): boolean =>
  Boolean(r.phone || r.email || r.website || r.address);

export function categorySlug(category: string): string {
  return category
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * `all` is always produced, even when empty; `with_contact` and category
 * views only when they have rows.
 */
export function buildViews(records: readonly BusinessRecord[], byCategory: boolean): OutputView[] {
  const views: OutputView[] = [{ name: 'all', records: [...records] }];

  const withContact = records.filter(hasContact);
  if (withContact.length) views.push({ name: 'with_contact', records: withContact });

  if (byCategory) {
    const groups = new Map<string, BusinessRecord[]>();
    for (const r of records) {
      const slug = categorySlug(r.category);
      if (!slug) continue;
      const group = groups.get(slug) ?? [];
      group.push(r);
      groups.set(slug, group);
    }
    for (const [slug, group] of groups) views.push({ name: `category_${slug}`, records: group });
  }
  return views;
}

export function outputFileName(basename: string, view: string, format: OutputFormat, partial: boolean): string {
  return `${basename}${partial ? '_partial' : ''}_${view}.${format}`;
}

export function createOutputWriter(options: OutputOptions): OutputWriter {
  return async (records, opts = {}) => {
    const partial = opts.partial ?? false;
    try {
      await mkdir(options.dir, { recursive: true });
    } catch (e) {
      throw new PersistenceError(`Could not create ${options.dir}: ${errorMessage(e)}`, {
        path: options.dir,
        cause: e,
      });
    }

    const written: string[] = [];
    for (const view of buildViews(records, options.byCategory)) {
      for (const format of options.formats) {
        const file = path.join(options.dir, outputFileName(options.basename, view.name, format, partial));
        const body = format === 'csv' ? toCsv(view.records) : toJson(view.records);
        try {
          await writeFile(file, body, 'utf8');
        } catch (e) {
          throw new PersistenceError(`Could not write ${file}: ${errorMessage(e)}`, { path: file, cause: e });
        }
        written.push(file);
      }
    }
    return written;
  };
}
