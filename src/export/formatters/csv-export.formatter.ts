import { Injectable } from '@nestjs/common';
import Papa from 'papaparse';

export const CATALOG_CSV_COLUMNS = [
  'sku',
  'parent_sku',
  'name',
  'price',
  'quantity',
  'available',
  'weight',
  'categories',
] as const;

export type CatalogCsvColumn = (typeof CATALOG_CSV_COLUMNS)[number];

export interface CatalogCsvRow extends Record<CatalogCsvColumn, string | number | boolean | null> {
  sku: string;
  /** Empty on product rows, the product SKU on variant rows. */
  parent_sku: string;
  name: string;
  price: number;
  quantity: number;
  available: boolean;
  weight: number | null;
  /** Category codes separated by `|`. */
  categories: string;
}

@Injectable()
export class CsvExportFormatter {
  convertToCsvString(rows: CatalogCsvRow[]): string {
    // The object form keeps the header line when there are no rows.
    return Papa.unparse({ fields: [...CATALOG_CSV_COLUMNS], data: rows }, { header: true, newline: '\n' });
  }
}
