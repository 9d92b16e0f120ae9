/**
 * Delivery Report Renderer
 */

import type { ContractDocumentData } from '../remap';
import { formatIssueDate } from '../remap';
import { heading, paragraph, signature, space, table, title, type DocumentBlock } from './blocks';
import { renderDocxBlocks } from './docx';
import { renderPdfBlocks } from './pdf';

export function deliveryReportBlocks(data: ContractDocumentData, issuedAt: Date): DocumentBlock[] {
  const products: DocumentBlock =
    data.products.length > 0
      ? table(
          ['Quantidade', 'Produto', 'Valor Unitário', 'Valor Total'],
          data.products.map((item) => [item.quantity, item.product, item.unitPrice, item.itemTotal])
        )
      : paragraph('Nenhum produto encontrado.');

  return [
    title('RELATÓRIO DE ENTREGA', 18),
    space(),
    paragraph(`Nome do Cliente: ${data.customer.name}`),
    paragraph(`Data do Evento: ${data.eventDate}`),
    paragraph(`Local do Evento: ${data.eventLocation}`),
    paragraph(`Data de Emissão: ${formatIssueDate(issuedAt)}`),
    heading('Produtos Contratados:'),
    products,
    space(),
    paragraph(`Valor Total do Pedido: R$ ${data.orderTotal}`),
    space(2),
    paragraph('Assinaturas:'),
    signature('Responsável pela Entrega'),
    signature('Responsável pela Retirada'),
  ];
}

export function renderDeliveryReport(data: ContractDocumentData, issuedAt: Date = new Date()): Promise<Buffer> {
  return renderPdfBlocks(deliveryReportBlocks(data, issuedAt));
}

export function renderDeliveryReportDocx(data: ContractDocumentData, issuedAt: Date = new Date()): Promise<Buffer> {
  return renderDocxBlocks(deliveryReportBlocks(data, issuedAt));
}
