import { z } from 'zod';

/** Canonical absolute URL of one listing's detail page. */
export type ListingIdentifier = string;

export const NAME_MIN_LENGTH = 2;
export const NAME_MAX_LENGTH = 150;
export const DESCRIPTION_MAX_LENGTH = 500;

export const BusinessRecordSchema = z.object({
  name: z.string().trim().min(NAME_MIN_LENGTH).max(NAME_MAX_LENGTH),
  category: z.string(),
  description: z.string().max(DESCRIPTION_MAX_LENGTH),
  address: z.string(),
  phone: z.string(),
  email: z.string(),
  website: z.string(),
  sourceUrl: z.string().url(),
});

export type BusinessRecord = z.infer<typeof BusinessRecordSchema>;

export const EXPORT_COLUMNS = [
  { label: 'Name', value: 'name' },
  { label: 'Category', value: 'category' },
  { label: 'Description', value: 'description' },
  { label: 'Address', value: 'address' },
  { label: 'Phone', value: 'phone' },
  { label: 'Email', value: 'email' },
  { label: 'Website', value: 'website' },
  { label: 'Source_URL', value: 'sourceUrl' },
] as const satisfies ReadonlyArray<{ label: string; value: keyof BusinessRecord }>;

export type ExportColumn = (typeof EXPORT_COLUMNS)[number]['label'];
export type ExportRow = Record<ExportColumn, string>;

export type OutputFormat = 'csv' | 'json';

export interface FetchedPage {
  url: string;
  status: number;
  body: string;
}

/**
 * Anything that can turn a URL into page content: plain HTTP or a rendered
 * browser tab. Non-2xx responses are returned, not thrown; callers decide.
 */
export interface PageSource {
  fetchPage(url: string): Promise<FetchedPage>;
}

export interface HarvestState {
  records: BusinessRecord[];
  processed: Set<ListingIdentifier>;
}

export type Sleep = (ms: number) => Promise<void>;
