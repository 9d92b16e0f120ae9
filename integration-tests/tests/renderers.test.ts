/**
 * Renderer and Remapping Tests
 *
 * Tests the mapping of records and form payloads into renderer fields, and
 * the documents produced from them.
 */

import ExcelJS from 'exceljs';
import type { NormalizedRecord } from '@contract-extraction/shared';
import {
  fromContractForm,
  fromNormalizedRecord,
  safeFileName,
  fileTimestamp,
  formatIssueDate,
  type ContractDocumentData,
} from '@contract-extraction/contract-api/remap';
import {
  loadContractClauses,
  partySentence,
  renderContractDocx,
  renderContractPdf,
  renderDeliveryReport,
  renderDeliveryReportDocx,
  renderSpreadsheet,
  spreadsheetFields,
  SHEET_NAME,
} from '@contract-extraction/contract-api/render';
import { readDocxParagraphs } from './helpers';

const RECORD: NormalizedRecord = {
  party: {
    name: 'Maria Souza',
    national_id: '123.456.789-09',
    secondary_id: '12.345.678-9',
    phone: '(11) 98765-4321',
    email: 'maria.souza@example.com',
    address: 'Rua das Flores, 10',
  },
  event_date: '20/12/2026',
  event_location: 'Salão Azul',
  line_items: [{ quantity: '2', description: 'Bolo', unit_price: '50,00', line_total: '100,00' }],
  payment_date: '10/01/2026',
  payment_method: 'via PIX',
  order_total: 'R$ 100,00',
  responsible_party: 'Ana Lima',
  referral_source: 'Instagram',
};

describe('Remapping', () => {
  describe('fromNormalizedRecord', () => {
    it('should map record fields into renderer fields', () => {
      const data = fromNormalizedRecord(RECORD);

      expect(data).toEqual({
        customer: {
          name: 'Maria Souza',
          rg: '12.345.678-9',
          cpf: '123.456.789-09',
          address: 'Rua das Flores, 10',
          phone: '(11) 98765-4321',
          email: 'maria.souza@example.com',
        },
        eventDate: '20/12/2026',
        eventLocation: 'Salão Azul',
        products: [{ quantity: '2', product: 'Bolo', unitPrice: '50,00', itemTotal: '100,00' }],
        orderTotal: '100,00',
        paymentDate: '10/01/2026',
        paymentMethod: 'via PIX',
        referralSource: 'Instagram',
        responsible: 'Ana Lima',
      });
    });

    it('should keep sentinels as they are', () => {
      const data = fromNormalizedRecord({ ...RECORD, order_total: 'Não encontrado', line_items: [] });

      expect(data.orderTotal).toBe('Não encontrado');
      expect(data.products).toEqual([]);
    });
  });

  describe('fromContractForm', () => {
    it('should default missing, null and empty fields to N/A', () => {
      const data = fromContractForm({ contratanteNome: null, contratanteRg: '' });

      expect(data.customer).toEqual({
        name: 'N/A',
        rg: 'N/A',
        cpf: 'N/A',
        address: 'N/A',
        phone: 'N/A',
        email: 'N/A',
      });
      expect(data.products).toEqual([]);
      expect(data.orderTotal).toBe('N/A');
    });

    it('should stringify numbers, trim text and strip the currency marker from the total', () => {
      const data = fromContractForm({
        contratanteNome: '  Maria Souza ',
        valorTotalPedidoContrato: 'R$ 1.250,00',
        produtosContratados: [{ Quantidade: 3, Produto: 'Torta', 'Valor Unitário': 90 }],
      });

      expect(data.customer.name).toBe('Maria Souza');
      expect(data.orderTotal).toBe('1.250,00');
      expect(data.products).toEqual([{ quantity: '3', product: 'Torta', unitPrice: '90', itemTotal: 'N/A' }]);
    });

    it('should accept a numeric total', () => {
      expect(fromContractForm({ valorTotalPedidoContrato: 340 }).orderTotal).toBe('340');
    });
  });

  describe('file names', () => {
    it('should replace unsafe characters and lower-case the name', () => {
      expect(safeFileName('José da Silva!')).toBe('jos__da_silva_');
      expect(safeFileName('N/A')).toBe('n_a');
    });

    it('should format the timestamp and issue date in local time', () => {
      const date = new Date(2026, 0, 5, 9, 7, 3);

      expect(fileTimestamp(date)).toBe('20260105090703');
      expect(formatIssueDate(date)).toBe('05/01/2026');
    });
  });
});

describe('Renderers', () => {
  const data: ContractDocumentData = fromNormalizedRecord(RECORD);

  describe('contract', () => {
    it('should write the party sentence with the labels the extractor anchors on', () => {
      expect(partySentence(data)).toBe(
        'Sr(a) Maria Souza, brasileiro(a), portador(a) da cédula de RG: 12.345.678-9 e CPF: 123.456.789-09, ' +
          'residente e domiciliado(a) na Rua das Flores, 10 - Tel. (11) 98765-4321.'
      );
    });

    it('should load the standard clauses around the event clause', () => {
      const clauses = loadContractClauses();

      expect(clauses.beforeEvent).toHaveLength(8);
      expect(clauses.beforeEvent[0].title).toMatch(/^CLÁUSULA 3 /);
      expect(clauses.afterEvent).toHaveLength(1);
      expect(clauses.afterEvent[0].title).toMatch(/^CLÁUSULA 12 /);
    });

    it('should render a PDF', async () => {
      const pdf = await renderContractPdf(data);

      expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    });

    it('should render a PDF without products', async () => {
      const pdf = await renderContractPdf({ ...data, products: [] });

      expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    });

    it('should write the same wording to DOCX', async () => {
      const paragraphs = await readDocxParagraphs(await renderContractDocx(data));

      expect(paragraphs).toContain('CONTRATO');
      expect(paragraphs).toContain(`CONTRATANTE: ${partySentence(data)}`);
      expect(paragraphs).toContain('E-mail: maria.souza@example.com');
      expect(paragraphs).toContain('TOTAL: R$ 100,00');
      expect(paragraphs).toContain('O evento acontecerá no dia: 20/12/2026 - Local do evento: Salão Azul');
      expect(paragraphs).toContain('Como nos conheceu: Instagram');
      expect(paragraphs).toContain('RESPONSÁVEL PELO CONTRATO: Ana Lima');
    });

    it('should write the product table to DOCX one cell per paragraph', async () => {
      const paragraphs = await readDocxParagraphs(await renderContractDocx(data));
      const header = paragraphs.indexOf('Quantidade');

      expect(paragraphs.slice(header, header + 8)).toEqual([
        'Quantidade',
        'Produto',
        'Valor Unitário',
        'Valor Total',
        '2',
        'Bolo',
        'R$ 50,00',
        'R$ 100,00',
      ]);
    });

    it('should note the missing products in DOCX', async () => {
      const paragraphs = await readDocxParagraphs(await renderContractDocx({ ...data, products: [] }));

      expect(paragraphs).toContain('Nenhum produto adicionado.');
      expect(paragraphs).not.toContain('Quantidade');
    });
  });

  describe('delivery report', () => {
    it('should render a PDF', async () => {
      const pdf = await renderDeliveryReport(data, new Date(2026, 0, 5));

      expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
    });

    it('should render a DOCX with customer, products, total and signatures', async () => {
      const paragraphs = await readDocxParagraphs(await renderDeliveryReportDocx(data, new Date(2026, 0, 5)));

      expect(paragraphs).toEqual([
        'RELATÓRIO DE ENTREGA',
        'Nome do Cliente: Maria Souza',
        'Data do Evento: 20/12/2026',
        'Local do Evento: Salão Azul',
        'Data de Emissão: 05/01/2026',
        'Produtos Contratados:',
        'Quantidade',
        'Produto',
        'Valor Unitário',
        'Valor Total',
        '2',
        'Bolo',
        '50,00',
        '100,00',
        'Valor Total do Pedido: R$ 100,00',
        'Assinaturas:',
        '______________________________',
        'Responsável pela Entrega',
        '______________________________',
        'Responsável pela Retirada',
      ]);
    });

    it('should note the missing products in DOCX', async () => {
      const paragraphs = await readDocxParagraphs(
        await renderDeliveryReportDocx({ ...data, products: [] }, new Date(2026, 0, 5))
      );

      expect(paragraphs[6]).toBe('Nenhum produto encontrado.');
    });
  });

  describe('spreadsheet', () => {
    async function readSheet(buffer: Buffer): Promise<ExcelJS.Worksheet | undefined> {
      const workbook = new ExcelJS.Workbook();
      await workbook.xlsx.load(buffer);
      return workbook.getWorksheet(SHEET_NAME);
    }

    it('should list the fields in sheet order', () => {
      const fields = spreadsheetFields(data);

      expect(fields).toHaveLength(13);
      expect(fields[0]).toEqual(['Contratante - Nome', 'Maria Souza']);
      expect(fields[8]).toEqual(['Valor Total do Pedido', '100,00']);
      expect(fields[12]).toEqual(['Responsável', 'Ana Lima']);
    });

    it('should write one row per field under the header', async () => {
      const sheet = await readSheet(await renderSpreadsheet(data));

      expect(sheet?.getCell('A1').value).toBe('Campo');
      expect(sheet?.getCell('B1').value).toBe('Informação Extraída');
      expect(sheet?.getCell('A2').value).toBe('Contratante - Nome');
      expect(sheet?.getCell('B2').value).toBe('Maria Souza');
      expect(sheet?.getCell('A14').value).toBe('Responsável');
      expect(sheet?.getCell('B14').value).toBe('Ana Lima');
    });

    it('should write the product table two rows below the fields', async () => {
      const sheet = await readSheet(await renderSpreadsheet(data));

      expect(sheet?.getCell('A15').value).toBeNull();
      expect(sheet?.getCell('A17').value).toBe('Quantidade');
      expect(sheet?.getCell('D17').value).toBe('Valor Total Item');
      expect(sheet?.getCell('A18').value).toBe('2');
      expect(sheet?.getCell('B18').value).toBe('Bolo');
      expect(sheet?.getCell('D18').value).toBe('100,00');
    });

    it('should omit the product table without products', async () => {
      const sheet = await readSheet(await renderSpreadsheet({ ...data, products: [] }));

      expect(sheet?.rowCount).toBe(14);
      expect(sheet?.getCell('A17').value).toBeNull();
    });
  });
});
