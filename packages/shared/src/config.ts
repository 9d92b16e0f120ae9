/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

import type { ExtractionMode } from './types';

export interface Config {
  // HTTP
  port: number;
  userIdHeader: string;
  maxUploadBytes: number;

  // Extraction
  defaultExtractionMode: ExtractionMode;

  // Entity tagger
  enableNer: boolean;
  nerModel: string;
  /** Directory holding provisioned models; the tagger never downloads */
  nerModelPath: string;
  nerChunkChars: number;

  // Contracted company (rendered contracts)
  companyName: string;
  companyTaxId: string;
  companyAddress: string;
  companyRepresentative: string;
  companyRepresentativeRg: string;
  companyCity: string;
}

export const config: Config = {
  // HTTP
  port: parseInt(process.env.PORT || '8080', 10),
  userIdHeader: (process.env.USER_ID_HEADER || 'x-user-id').toLowerCase(),
  maxUploadBytes: parseInt(process.env.MAX_UPLOAD_BYTES || String(10 * 1024 * 1024), 10),

  // Extraction
  defaultExtractionMode: process.env.DEFAULT_EXTRACTION_MODE === 'pattern' ? 'pattern' : 'statistical',

  // Entity tagger
  enableNer: process.env.ENABLE_NER !== 'false',
  nerModel: process.env.NER_MODEL || 'Xenova/bert-base-multilingual-cased-ner-hrl',
  nerModelPath: process.env.NER_MODEL_PATH || './models/',
  nerChunkChars: parseInt(process.env.NER_CHUNK_CHARS || '1000', 10),

  // Contracted company (rendered contracts)
  companyName: process.env.COMPANY_NAME || 'Empresa Contratada',
  companyTaxId: process.env.COMPANY_TAX_ID || '00.000.000/0001-00',
  companyAddress: process.env.COMPANY_ADDRESS || 'Rua Exemplo, 100, São Paulo SP',
  companyRepresentative: process.env.COMPANY_REPRESENTATIVE || 'Responsável Legal',
  companyRepresentativeRg: process.env.COMPANY_REPRESENTATIVE_RG || '00.000.000-0',
  companyCity: process.env.COMPANY_CITY || 'São Paulo',
};
