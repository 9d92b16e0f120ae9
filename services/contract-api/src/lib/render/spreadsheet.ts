/**
 * Spreadsheet Renderer
 *
 * One row per field, then the product table two rows below.
 */

import ExcelJS from 'exceljs';
import type { ContractDocumentData } from '../remap';

export const MIME_XLSX = 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';

export const SHEET_NAME = 'Dados do Contrato';

export const PRODUCT_HEADERS = ['Quantidade', 'Produto', 'Valor Unitário', 'Valor Total Item'];

/**
 * Field label / value pairs in sheet order.
 */
export function spreadsheetFields(data: ContractDocumentData): Array<[string, string]> {
  const c = data.customer;
  return [
    ['Contratante - Nome', c.name],
    ['Contratante - RG', c.rg],
    ['Contratante - CPF', c.cpf],
    ['Contratante - Endereço', c.address],
    ['Contratante - Telefone', c.phone],
    ['Contratante - Email', c.email],
    ['Data do Evento', data.eventDate],
    ['Local do Evento', data.eventLocation],
    ['Valor Total do Pedido', data.orderTotal],
    ['Data de Pagamento', data.paymentDate],
    ['Forma de Pagamento', data.paymentMethod],
    ['Como nos conheceu', data.referralSource],
    ['Responsável', data.responsible],
  ];
}

export async function renderSpreadsheet(data: ContractDocumentData): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  workbook.created = new Date();

  const sheet = workbook.addWorksheet(SHEET_NAME);
  sheet.getCell(1, 1).value = 'Campo';
  sheet.getCell(1, 2).value = 'Informação Extraída';
  sheet.getRow(1).font = { bold: true };

  let row = 2;
  for (const [label, value] of spreadsheetFields(data)) {
    sheet.getCell(row, 1).value = label;
    sheet.getCell(row, 2).value = value;
    row++;
  }

  if (data.products.length > 0) {
    row += 2;
    PRODUCT_HEADERS.forEach((header, i) => {
      sheet.getCell(row, i + 1).value = header;
    });
    sheet.getRow(row).font = { bold: true };
    row++;

    for (const item of data.products) {
      [item.quantity, item.product, item.unitPrice, item.itemTotal].forEach((value, i) => {
        sheet.getCell(row, i + 1).value = value;
      });
      row++;
    }
  }

  sheet.getColumn(1).width = 28;
  sheet.getColumn(2).width = 40;

  const buffer = await workbook.xlsx.writeBuffer();
  return Buffer.from(buffer);
}
