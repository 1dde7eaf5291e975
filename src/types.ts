export type PageText = readonly string[];

export interface ProductRow {
  articleNumber: string;
  name: string;
  columnHeaders: string;
  specText: string;
}

export interface CatalogItem {
  item_no: string | null;
  item: string;
  category: string;
  unit: string;
  price: number | null;
}

export interface InvoiceLine {
  itemNo: string | null;
  description: string;
  category: string;
  quantity: number;
  unit: string;
  unitPrice: number;
  amount: number;
}

export interface InvoiceRates {
  vatRate: number;
  rotRate: number;
  rotCategory: string;
}

export interface InvoiceTotals {
  totalExclVat: number;
  totalInclVat: number;
  laborInclVat: number;
  rotDeduction: number;
  amountDue: number;
}

export interface InvoiceHeader {
  customerName: string;
  projectNumber: string;
  date: Date;
}
