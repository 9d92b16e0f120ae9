/**
 * Record Remapping
 *
 * Renderers read contract data under their own field names. These functions
 * map the extraction record and the order form payload into that shape.
 */

import { SENTINELS, type ContractForm, type ContractFormProduct, type NormalizedRecord } from '@contract-extraction/shared';

export interface ContractCustomer {
  name: string;
  rg: string;
  cpf: string;
  address: string;
  phone: string;
  email: string;
}

export interface ContractProduct {
  quantity: string;
  product: string;
  unitPrice: string;
  itemTotal: string;
}

export interface ContractDocumentData {
  customer: ContractCustomer;
  eventDate: string;
  eventLocation: string;
  products: ContractProduct[];
  /** Amount without the currency marker */
  orderTotal: string;
  paymentDate: string;
  paymentMethod: string;
  referralSource: string;
  responsible: string;
}

function text(value: string | number | null | undefined): string {
  if (value === null || value === undefined || value === '') return SENTINELS.NOT_AVAILABLE;
  return String(value).trim();
}

function withoutCurrency(value: string): string {
  return value.replace(/^R\$\s*/, '').trim();
}

/**
 * Map an extraction record into renderer vocabulary.
 */
export function fromNormalizedRecord(record: NormalizedRecord): ContractDocumentData {
  return {
    customer: {
      name: record.party.name,
      rg: record.party.secondary_id,
      cpf: record.party.national_id,
      address: record.party.address,
      phone: record.party.phone,
      email: record.party.email,
    },
    eventDate: record.event_date,
    eventLocation: record.event_location,
    products: record.line_items.map((item) => ({
      quantity: item.quantity,
      product: item.description,
      unitPrice: item.unit_price,
      itemTotal: item.line_total,
    })),
    orderTotal: withoutCurrency(record.order_total),
    paymentDate: record.payment_date,
    paymentMethod: record.payment_method,
    referralSource: record.referral_source,
    responsible: record.responsible_party,
  };
}

function fromFormProduct(product: ContractFormProduct): ContractProduct {
  return {
    quantity: text(product.Quantidade),
    product: text(product.Produto),
    unitPrice: text(product['Valor Unitário']),
    itemTotal: text(product['Valor Total Item']),
  };
}

/**
 * Map a validated order form payload into renderer vocabulary.
 */
export function fromContractForm(form: ContractForm): ContractDocumentData {
  return {
    customer: {
      name: text(form.contratanteNome),
      rg: text(form.contratanteRg),
      cpf: text(form.contratanteCpf),
      address: text(form.contratanteEndereco),
      phone: text(form.contratanteTelefone),
      email: text(form.contratanteEmail),
    },
    eventDate: text(form.dataEvento),
    eventLocation: text(form.localEvento),
    products: (form.produtosContratados ?? []).map(fromFormProduct),
    orderTotal: withoutCurrency(text(form.valorTotalPedidoContrato)),
    paymentDate: text(form.dataPagamentoContrato),
    paymentMethod: text(form.formaPagamento),
    referralSource: text(form.comoConheceu),
    responsible: text(form.responsavelContrato),
  };
}

/**
 * Lower-cased name safe for a download file name: anything outside
 * letters, digits, "_" and "-" becomes "_".
 */
export function safeFileName(name: string): string {
  return name.replace(/[^\w-]/g, '_').toLowerCase();
}

/**
 * yyyyMMddHHmmss in local time.
 */
export function fileTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * dd/MM/yyyy in local time.
 */
export function formatIssueDate(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()}`;
}
