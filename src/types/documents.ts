/**
 * Document model shared by every pipeline stage.
 *
 * Amounts stay as the text the extraction agent read (e.g. "1.234,56"); the
 * auditor and the consensus engine parse them when they need numbers.
 */

// ============================================================================
// Classification
// ============================================================================

export type DocumentType =
  | 'INVOICE'
  | 'CREDIT_NOTE'
  | 'PRO_FORMA'
  | 'BILL'
  | 'RECEIPT'
  | 'EXPENSE'
  | 'UNKNOWN';

/**
 * The four pipeline lanes. Credit notes and pro-formas share the invoice lane.
 */
export type DocumentKind = 'invoice' | 'bill' | 'receipt' | 'expense';

export interface DocumentClassification {
  documentType: DocumentType;
  /** 0-1 */
  confidence: number;
  reasoning?: string;
}

export function routeDocumentType(documentType: DocumentType): DocumentKind | null {
  switch (documentType) {
    case 'INVOICE':
    case 'CREDIT_NOTE':
    case 'PRO_FORMA':
      return 'invoice';
    case 'BILL':
      return 'bill';
    case 'RECEIPT':
      return 'receipt';
    case 'EXPENSE':
      return 'expense';
    case 'UNKNOWN':
      return null;
  }
}

// ============================================================================
// Inputs
// ============================================================================

/**
 * One rendered page of the document, in reading order.
 */
export interface PageImage {
  pageNumber: number;
  mimeType: 'image/png' | 'image/jpeg' | 'image/webp';
  data: Uint8Array;
}

/**
 * Who the document is being processed for. Passed through to the classifier
 * and used for log context; the pipeline keeps no per-tenant state.
 */
export interface TenantContext {
  tenantId: string;
  /** The tenant's own VAT number, when known */
  vatNumber?: string;
  /** Jurisdiction override for the VAT-rate check (defaults to config) */
  jurisdiction?: string;
  locale?: string;
}

// ============================================================================
// Extracted data
// ============================================================================

export interface LineItem {
  description: string;
  quantity?: string;
  unitPrice?: string;
  total?: string;
  vatRate?: string;
}

interface ExtractedBase {
  currency?: string;
  /** Extraction agent's own confidence, 0-1 */
  confidence: number;
  /** Raw text dump; never compared during consensus */
  extractedText?: string;
}

export interface ExtractedInvoiceData extends ExtractedBase {
  vendorName?: string;
  vendorVatNumber?: string;
  vendorAddress?: string;
  invoiceNumber?: string;
  issueDate?: string;
  dueDate?: string;
  paymentTerms?: string;
  category?: string;
  lineItems: LineItem[];
  subtotal?: string;
  totalVatAmount?: string;
  totalAmount?: string;
  iban?: string;
  bic?: string;
  paymentReference?: string;
}

export interface ExtractedBillData extends ExtractedBase {
  supplierName?: string;
  supplierVatNumber?: string;
  supplierAddress?: string;
  invoiceNumber?: string;
  issueDate?: string;
  dueDate?: string;
  /** Net amount as printed; some suppliers print the gross here */
  amount?: string;
  vatAmount?: string;
  vatRate?: string;
  totalAmount?: string;
  lineItems: LineItem[];
  category?: string;
  description?: string;
  paymentTerms?: string;
  bankAccount?: string;
  paymentReference?: string;
  notes?: string;
}

export interface ExtractedReceiptData extends ExtractedBase {
  merchantName?: string;
  merchantAddress?: string;
  merchantVatNumber?: string;
  receiptNumber?: string;
  transactionDate?: string;
  transactionTime?: string;
  items: LineItem[];
  subtotal?: string;
  vatAmount?: string;
  totalAmount?: string;
  paymentMethod?: string;
  cardLastFour?: string;
  suggestedCategory?: string;
}

export interface ExtractedExpenseData extends ExtractedBase {
  merchantName?: string;
  merchantVatNumber?: string;
  description?: string;
  date?: string;
  totalAmount?: string;
  category?: string;
  paymentMethod?: string;
  vatAmount?: string;
  vatRate?: string;
  reference?: string;
}

/**
 * Extracted data keyed by lane, for code generic over the lane
 */
export interface ExtractedDataByKind {
  invoice: ExtractedInvoiceData;
  bill: ExtractedBillData;
  receipt: ExtractedReceiptData;
  expense: ExtractedExpenseData;
}

export type ExtractedData = ExtractedDataByKind[DocumentKind];
