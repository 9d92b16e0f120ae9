/**
 * Core Types
 *
 * The Normalized Record produced by every extraction strategy, plus the
 * envelopes shared by the HTTP layer.
 */

// ============================================================================
// Extraction Modes
// ============================================================================

/**
 * - 'pattern': anchored regex parsing for contracts generated from the known template
 * - 'statistical': entity tagging + light regex for contracts of unknown layout
 */
export type ExtractionMode = 'pattern' | 'statistical';

export const EXTRACTION_MODES: readonly ExtractionMode[] = ['pattern', 'statistical'];

/**
 * Names the upload form has historically sent for each mode.
 */
const MODE_ALIASES: Record<string, ExtractionMode> = {
  pattern: 'pattern',
  sistema: 'pattern',
  statistical: 'statistical',
  padrao: 'statistical',
};

/**
 * Resolve a caller-supplied mode string. Missing or blank values resolve to the
 * fallback; unrecognized values resolve to null.
 */
export function parseExtractionMode(
  value: string | undefined | null,
  fallback: ExtractionMode = 'statistical'
): ExtractionMode | null {
  if (value === undefined || value === null || value.trim() === '') {
    return fallback;
  }
  return MODE_ALIASES[value.trim().toLowerCase()] ?? null;
}

// ============================================================================
// Sentinels
// ============================================================================

export const SENTINELS = {
  /** Field not matched (pattern strategy, regex fields of the statistical strategy) */
  NOT_AVAILABLE: 'N/A',
  /** Field the statistical strategy looked for and did not find */
  NOT_FOUND: 'Não encontrado',
  /** Field the statistical strategy never reads; the user must check the document */
  VERIFY_IN_DOCUMENT: 'Verificar no Doc.',
} as const;

export type Sentinel = (typeof SENTINELS)[keyof typeof SENTINELS];

// ============================================================================
// Normalized Record
// ============================================================================

export interface PartyInfo {
  name: string;
  /** CPF */
  national_id: string;
  /** RG */
  secondary_id: string;
  phone: string;
  email: string;
  address: string;
}

export interface LineItem {
  quantity: string;
  description: string;
  /** Without the currency marker */
  unit_price: string;
  /** Without the currency marker */
  line_total: string;
}

export interface NormalizedRecord {
  party: PartyInfo;
  event_date: string;
  event_location: string;
  /** Source order, top to bottom */
  line_items: LineItem[];
  payment_date: string;
  payment_method: string;
  /** Keeps the currency marker, e.g. "R$ 100,00" */
  order_total: string;
  responsible_party: string;
  referral_source: string;
}

// ============================================================================
// API Types
// ============================================================================

/**
 * A product row as submitted by the order form.
 */
export interface ContractFormProduct {
  Quantidade?: string | number;
  Produto?: string;
  'Valor Unitário'?: string | number;
  'Valor Total Item'?: string | number;
}

/**
 * Contract data as submitted by the order form for document generation.
 * Shape is enforced by docs/contracts/contract_form.schema.json.
 */
export interface ContractForm {
  contratanteNome?: string | null;
  contratanteRg?: string | null;
  contratanteCpf?: string | null;
  contratanteEndereco?: string | null;
  contratanteTelefone?: string | null;
  contratanteEmail?: string | null;
  dataEvento?: string | null;
  localEvento?: string | null;
  produtosContratados?: ContractFormProduct[];
  valorTotalPedidoContrato?: string | number | null;
  dataPagamentoContrato?: string | null;
  formaPagamento?: string | null;
  comoConheceu?: string | null;
  responsavelContrato?: string | null;
  formato_desejado?: 'docx' | 'pdf';
}

export interface ExtractionResponse {
  message: string;
  extractedData: NormalizedRecord;
}

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
