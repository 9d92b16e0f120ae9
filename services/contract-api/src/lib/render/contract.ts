/**
 * Contract Renderer
 *
 * Renders the contract in the wording the pattern extractor reads back:
 * party sentence, product table rows, payment and event sentences.
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { config, logger } from '@contract-extraction/shared';
import type { ContractDocumentData } from '../remap';
import { heading, paragraph, signature, space, table, title, type DocumentBlock } from './blocks';
import { renderDocxBlocks } from './docx';
import { renderPdfBlocks } from './pdf';

export interface ContractClause {
  title: string;
  paragraphs: string[];
}

export interface ContractClauses {
  beforeEvent: ContractClause[];
  afterEvent: ContractClause[];
}

const CLAUSES_PATH = path.join(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../../templates/contract-clauses.json'
);

let clauses: ContractClauses | null = null;

function isClause(value: unknown): value is ContractClause {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'title' in value &&
    typeof value.title === 'string' &&
    'paragraphs' in value &&
    Array.isArray(value.paragraphs) &&
    value.paragraphs.every((p: unknown) => typeof p === 'string')
  );
}

function clauseList(value: unknown, key: string): ContractClause[] {
  if (!Array.isArray(value) || !value.every(isClause)) {
    throw new Error(`Invalid contract clauses template: "${key}" must be a list of clauses`);
  }
  return value;
}

/**
 * Standard clauses, read once from templates/contract-clauses.json.
 */
export function loadContractClauses(): ContractClauses {
  if (!clauses) {
    const parsed: unknown = JSON.parse(fs.readFileSync(CLAUSES_PATH, 'utf-8'));
    if (typeof parsed !== 'object' || parsed === null) {
      throw new Error('Invalid contract clauses template: expected an object');
    }
    clauses = {
      beforeEvent: clauseList('beforeEvent' in parsed ? parsed.beforeEvent : undefined, 'beforeEvent'),
      afterEvent: clauseList('afterEvent' in parsed ? parsed.afterEvent : undefined, 'afterEvent'),
    };
    logger.debug('Contract clauses loaded', {
      before_event: clauses.beforeEvent.length,
      after_event: clauses.afterEvent.length,
    });
  }
  return clauses;
}

function clauseBlocks(clause: ContractClause): DocumentBlock[] {
  return [heading(clause.title), ...clause.paragraphs.flatMap((text) => [paragraph(text), space(0.5)])];
}

/**
 * The contracting-party sentence. Its labels anchor the party patterns.
 */
export function partySentence(data: ContractDocumentData): string {
  const c = data.customer;
  return (
    `Sr(a) ${c.name}, brasileiro(a), portador(a) da cédula de RG: ${c.rg} e CPF: ${c.cpf}, ` +
    `residente e domiciliado(a) na ${c.address} - Tel. ${c.phone}.`
  );
}

/**
 * Contract layout: parties, product table, payment, standard clauses, event,
 * signatures.
 */
export function contractBlocks(data: ContractDocumentData): DocumentBlock[] {
  const { beforeEvent, afterEvent } = loadContractClauses();
  const products: DocumentBlock[] =
    data.products.length > 0
      ? [
          table(
            ['Quantidade', 'Produto', 'Valor Unitário', 'Valor Total'],
            data.products.map((item) => [item.quantity, item.product, `R$ ${item.unitPrice}`, `R$ ${item.itemTotal}`])
          ),
          space(0.5),
          paragraph(`TOTAL: R$ ${data.orderTotal}`),
        ]
      : [paragraph('Nenhum produto adicionado.')];

  return [
    title(config.companyName, 18),
    title('CONTRATO', 12),
    space(),
    paragraph({ text: 'CONTRATANTE: ', bold: true }, partySentence(data)),
    paragraph(`E-mail: ${data.customer.email}`),
    space(0.5),
    paragraph(
      { text: 'CONTRATADO: ', bold: true },
      `${config.companyName}, inscrito sob o CNPJ: ${config.companyTaxId}, com sede na ${config.companyAddress}, ` +
        `representado por ${config.companyRepresentative}, portador do RG: ${config.companyRepresentativeRg}.`
    ),

    heading('CLÁUSULA 1 - PRODUTOS CONTRATADOS'),
    ...products,

    heading('CLÁUSULA 2 - VALOR E FORMA DE PAGAMENTO'),
    paragraph(
      `O valor total de R$ ${data.orderTotal} referente aos produtos acima citados, ` +
        `foram pagos no dia ${data.paymentDate} ${data.paymentMethod}.`
    ),

    ...beforeEvent.flatMap(clauseBlocks),

    heading('CLÁUSULA 11 - DATA E LOCAL DO EVENTO'),
    paragraph(`O evento acontecerá no dia: ${data.eventDate} - Local do evento: ${data.eventLocation}`),
    paragraph(`Como nos conheceu: ${data.referralSource}`),

    ...afterEvent.flatMap(clauseBlocks),

    space(),
    paragraph(`RESPONSÁVEL PELO CONTRATO: ${data.responsible}`),
    paragraph(`${config.companyCity}, ${data.paymentDate}`),
    signature('CONTRATANTE'),
    signature('CONTRATADO'),
  ];
}

export function renderContractPdf(data: ContractDocumentData): Promise<Buffer> {
  return renderPdfBlocks(contractBlocks(data));
}

export function renderContractDocx(data: ContractDocumentData): Promise<Buffer> {
  return renderDocxBlocks(contractBlocks(data));
}
