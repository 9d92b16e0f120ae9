export {
  renderContractPdf,
  renderContractDocx,
  contractBlocks,
  loadContractClauses,
  partySentence,
  type ContractClause,
  type ContractClauses,
} from './contract';
export { renderDeliveryReport, renderDeliveryReportDocx, deliveryReportBlocks } from './delivery-report';
export { renderSpreadsheet, spreadsheetFields, SHEET_NAME, PRODUCT_HEADERS, MIME_XLSX } from './spreadsheet';
export { renderPdf, renderPdfBlocks, MIME_PDF } from './pdf';
export { renderDocxBlocks, MIME_DOCX } from './docx';
export type { DocumentBlock, TextSpan } from './blocks';
