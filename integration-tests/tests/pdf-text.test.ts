/**
 * PDF Text Extraction Tests
 *
 * Renders PDFs with PDFKit and reads them back with pdfjs.
 */

import { ContractExtractor, extractTextFromPdf } from '@contract-extraction/shared';
import { renderPdf, renderContractPdf } from '@contract-extraction/contract-api/render';
import { fromContractForm } from '@contract-extraction/contract-api/remap';
import { toBytes } from './helpers';

describe('PDF Text Extraction', () => {
  it('should concatenate pages in order', async () => {
    const pdf = await renderPdf((doc) => {
      doc.text('PAGINAUM');
      doc.addPage();
      doc.text('PAGINADOIS');
    });

    const text = await extractTextFromPdf(pdf);

    expect(text).toBe('PAGINAUM\nPAGINADOIS\n');
  });

  it('should keep cells written on one baseline on one line', async () => {
    const pdf = await renderPdf((doc) => {
      const y = doc.y;
      doc.text('direita', 300, y, { lineBreak: false });
      doc.text('esquerda', 50, y, { lineBreak: false });
    });

    const text = await extractTextFromPdf(pdf);

    expect(text).toBe('esquerda direita\n');
  });

  it('should return null for bytes that are not a PDF', async () => {
    await expect(extractTextFromPdf(toBytes('isto não é um PDF'))).resolves.toBeNull();
  });

  it('should leave the caller bytes intact', async () => {
    const pdf = await renderPdf((doc) => {
      doc.text('CONTEUDO');
    });
    const copy = Buffer.from(pdf);

    await extractTextFromPdf(pdf);

    expect(pdf.equals(copy)).toBe(true);
  });

  describe('rendered contract read back by the pattern extractor', () => {
    const data = fromContractForm({
      contratanteNome: 'Maria Souza',
      contratanteRg: '12.345.678-9',
      contratanteCpf: '123.456.789-09',
      contratanteEndereco: 'Rua das Flores, 10',
      contratanteTelefone: '(11) 98765-4321',
      contratanteEmail: 'maria@example.com',
      dataEvento: '20/12/2026',
      localEvento: 'Salão Azul',
      produtosContratados: [
        { Quantidade: 2, Produto: 'Bolo', 'Valor Unitário': '50,00', 'Valor Total Item': '100,00' },
        { Quantidade: 30, Produto: 'Brigadeiro', 'Valor Unitário': '2,00', 'Valor Total Item': '60,00' },
      ],
      valorTotalPedidoContrato: '160,00',
      dataPagamentoContrato: '10/01/2026',
      formaPagamento: 'via PIX',
      comoConheceu: 'Instagram',
      responsavelContrato: 'Ana Lima',
    });

    it('should recover the product table, totals and single-line fields', async () => {
      const pdf = await renderContractPdf(data);
      const record = await new ContractExtractor().extract(pdf, 'pattern');

      expect(record?.line_items).toEqual([
        { quantity: '2', description: 'Bolo', unit_price: '50,00', line_total: '100,00' },
        { quantity: '30', description: 'Brigadeiro', unit_price: '2,00', line_total: '60,00' },
      ]);
      expect(record?.order_total).toBe('R$ 160,00');
      expect(record?.party.email).toBe('maria@example.com');
      expect(record?.event_date).toBe('20/12/2026');
      expect(record?.event_location).toBe('Salão Azul');
      expect(record?.referral_source).toBe('Instagram');
      expect(record?.responsible_party).toBe('Ana Lima');
    });

    it('should recover a description longer than its column', async () => {
      const description = 'Bolo de chocolate com morangos e chantilly decorado em tres andares';
      const pdf = await renderContractPdf({
        ...data,
        products: [{ quantity: '1', product: description, unitPrice: '480,00', itemTotal: '480,00' }],
        orderTotal: '480,00',
      });
      const record = await new ContractExtractor().extract(pdf, 'pattern');

      expect(record?.line_items).toEqual([
        { quantity: '1', description, unit_price: '480,00', line_total: '480,00' },
      ]);
      expect(record?.order_total).toBe('R$ 480,00');
    });

    it('should recover the party identifiers', async () => {
      const pdf = await renderContractPdf(data);
      const record = await new ContractExtractor().extract(pdf, 'pattern');

      expect(record?.party.secondary_id).toBe('12.345.678-9');
      expect(record?.party.national_id.replace(/\s+/g, '')).toBe('123.456.789-09');
    });
  });
});
