/**
 * Test Helpers
 *
 * Sample contract texts, fake extraction dependencies, and an in-process
 * HTTP server for API tests.
 */

import type { Express } from 'express';
import JSZip from 'jszip';
import type { EntityTagger, TaggedEntity, TextExtractor } from '@contract-extraction/shared';

/**
 * Text of a contract generated from the system template.
 */
export const SAMPLE_CONTRACT = `Empresa Contratada
CONTRATO
CONTRATANTE: Sr(a) Maria Souza, brasileiro(a), portador(a) da cédula de RG: 12.345.678-9 e CPF: 123.456.789-09, residente e domiciliado(a) na Rua das Flores, 10 - Tel. (11) 98765-4321.
Email: maria.souza@example.com
CONTRATADO: Empresa Contratada, inscrito sob o CNPJ: 00.000.000/0001-00, com sede na Rua Exemplo, 100, representado por Responsável Legal, portador do RG: 99.888.777-6 e CPF: 987.654.321-00, domiciliado(a) na Avenida Outra, 5 - Tel. (21) 3333-4444.
CLÁUSULA 1 - PRODUTOS CONTRATADOS
Quantidade Produto Valor Unitário Valor Total
2 Bolo R$ 50,00 R$ 100,00
100 Brigadeiro gourmet R$ 2,50 R$ 250,00
50 Bem-casado R$ 3,00 R$ 150,00
TOTAL: R$ 500,00
CLÁUSULA 2 - VALOR E FORMA DE PAGAMENTO
O valor total de R$ 500,00 referente aos produtos acima citados, foram pagos no dia 10/01/2026 via PIX.
CLÁUSULA 11 - DATA E LOCAL DO EVENTO
O evento acontecerá no dia: 20/12/2026 - Local do evento: Salão Azul, Rua do Evento, 200
Como nos conheceu: Instagram
RESPONSÁVEL PELO CONTRATO: Ana Lima
São Paulo, 10/01/2026
`;

/**
 * A free-form contract with no known template.
 */
export const FREE_FORM_CONTRACT = `Contrato de prestação de serviços
Cliente: João Pereira, CPF 111.222.333-44, telefone (21) 91234-5678, e-mail joao@example.org
Data do evento: 15/03/2026
Local: Espaço Jardim
Preço final: R$ 1.250,00
`;

/**
 * Text extractor that reads the bytes as UTF-8 text. Bytes starting with
 * "CORRUPT" behave like an unreadable document.
 */
export const utf8TextExtractor: TextExtractor = async (bytes) => {
  const text = Buffer.from(bytes).toString('utf-8');
  return text.startsWith('CORRUPT') ? null : text;
};

/**
 * Tagger returning fixed entities, counting its calls.
 */
export class FakeTagger implements EntityTagger {
  calls: string[] = [];

  constructor(private readonly entities: TaggedEntity[]) {}

  async tag(text: string): Promise<TaggedEntity[]> {
    this.calls.push(text);
    return this.entities;
  }
}

export function toBytes(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, 'utf-8'));
}

export interface TestServer {
  baseUrl: string;
  close: () => Promise<void>;
}

/**
 * Listen on an ephemeral port.
 */
export function startServer(app: Express): Promise<TestServer> {
  return new Promise((resolve) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      resolve({
        baseUrl: `http://127.0.0.1:${port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.closeAllConnections();
            server.close((error) => (error ? fail(error) : done()));
          }),
      });
    });
  });
}

const DOCX_TEXT_PATTERN = /<w:t(?:\s[^>]*)?>([^<]*)<\/w:t>/g;

function unescapeXml(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, '&');
}

/**
 * Text of each non-empty paragraph of a Word document, table cells included, in order.
 */
export async function readDocxParagraphs(buffer: Buffer): Promise<string[]> {
  const zip = await JSZip.loadAsync(buffer);
  const xml = await zip.file('word/document.xml')?.async('string');
  if (xml === undefined) throw new Error('word/document.xml missing from DOCX');

  return xml
    .split('</w:p>')
    .map((part) => Array.from(part.matchAll(DOCX_TEXT_PATTERN), (match) => unescapeXml(match[1])).join(''))
    .filter((text) => text !== '');
}
