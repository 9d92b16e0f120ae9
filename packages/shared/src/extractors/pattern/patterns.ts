/**
 * Contract Template Patterns
 *
 * Regular expressions for the system-generated contract template. The
 * template has fixed clause wording that enables anchored extraction:
 * - "CONTRATANTE: ... CONTRATADO:" -> contracting party block
 * - "CLÁUSULA 1 - PRODUTOS CONTRATADOS ... TOTAL: R$" -> product table
 * - "pagos no dia <date> <method>." -> payment terms
 * - "O evento acontecerá no dia: <date> - Local do evento: <place>" -> event
 *
 * Unless noted, matching is case-insensitive and `.` crosses line breaks, so a
 * field wrapped onto the next line is still captured.
 */

import type { LineItem, PartyInfo } from '../../types';
import { SENTINELS } from '../../types';
import { firstGroup } from '../base-extractor';

export const PARTY_SECTION_PATTERN = /CONTRATANTE:([\s\S]*?)CONTRATADO:/is;

export const PARTY_NAME_PATTERN = /Sr\(a\)\s*(.*?),\s*brasileiro/is;
/** Ends on a digit or check letter, so a sentence-ending period is left out */
export const PARTY_RG_PATTERN = /RG:\s*([\dX.-]*[\dX])/is;
export const PARTY_CPF_PATTERN = /CPF:\s*([\d.\s-]+?),/is;
export const PARTY_ADDRESS_PATTERN = /domiciliado\(a\) na (.*?) - Tel\./is;
export const PARTY_PHONE_PATTERN = /Tel\.\s*(.*?)\./is;

/**
 * "Email:" or "E-mail:", where the label may be hyphenated across a line wrap.
 */
export const EMAIL_PATTERN = /(?:E-\s*\n?mail|Email):\s*([\w.%+-]+@[\w.-]+\.[a-zA-Z]{2,})/is;

export const PRODUCT_BLOCK_PATTERN = /CLÁUSULA 1 - PRODUTOS CONTRATADOS([\s\S]*?)TOTAL:\s*R\$/is;

/**
 * One table row: quantity, description, unit price, line total. The required
 * "R$" before each price is what ends the lazy description. Line-anchored and
 * case-sensitive, `.` stays on its line.
 */
export const PRODUCT_ROW_PATTERN = /^\s*(\d+)\s+(.*?)\s+(R\$\s*[\d,.]+)\s+(R\$\s*[\d,.]+)\s*$/gm;

export const ORDER_TOTAL_PATTERN = /TOTAL:\s*(R\$\s*[\d,.]+)/is;
export const PAYMENT_DATE_PATTERN = /pagos no dia\s*([\d/]+)/is;
export const PAYMENT_METHOD_PATTERN = /pagos no dia\s*[\d/]+\s*(.*?)\./is;
export const EVENT_PATTERN =
  /O evento acontecerá no dia:\s*(.*?)\s*-\s*Local do evento:\s*(.*?)Como nos conheceu:/is;
export const RESPONSIBLE_PATTERN = /RESPONSÁVEL PELO CONTRATO:\s*(.*?)\s*(?:\n|$)/is;
export const REFERRAL_PATTERN = /Como nos conheceu:\s*(.*?)\s*(?:\n|$)/is;

const CURRENCY_MARKER = 'R$';

/**
 * Remove the leading currency marker from a price, e.g. "R$ 50,00" -> "50,00".
 */
export function stripCurrency(value: string): string {
  return value.replace(CURRENCY_MARKER, '').trim();
}

export function orNotAvailable(value: string | null): string {
  return value ?? SENTINELS.NOT_AVAILABLE;
}

/**
 * Isolate the contracting-party block, or null when either header is missing.
 */
export function extractPartySection(text: string): string | null {
  const match = PARTY_SECTION_PATTERN.exec(text);
  return match ? match[1] : null;
}

/**
 * Extract name, RG, CPF, address and phone from the contracting-party block only,
 * so identifiers of the contracted company after "CONTRATADO:" are never picked up.
 * Email is not part of the block and stays at the sentinel here.
 */
export function extractPartyFields(text: string): PartyInfo {
  const party: PartyInfo = {
    name: SENTINELS.NOT_AVAILABLE,
    national_id: SENTINELS.NOT_AVAILABLE,
    secondary_id: SENTINELS.NOT_AVAILABLE,
    phone: SENTINELS.NOT_AVAILABLE,
    email: SENTINELS.NOT_AVAILABLE,
    address: SENTINELS.NOT_AVAILABLE,
  };

  const section = extractPartySection(text);
  if (section === null) return party;

  party.name = orNotAvailable(firstGroup(section, PARTY_NAME_PATTERN));
  party.secondary_id = orNotAvailable(firstGroup(section, PARTY_RG_PATTERN));
  party.national_id = orNotAvailable(firstGroup(section, PARTY_CPF_PATTERN));
  party.address = orNotAvailable(firstGroup(section, PARTY_ADDRESS_PATTERN));
  party.phone = orNotAvailable(firstGroup(section, PARTY_PHONE_PATTERN));

  return party;
}

/**
 * Extract the contracting party's email from anywhere in the text.
 */
export function extractEmail(text: string): string | null {
  return firstGroup(text, EMAIL_PATTERN);
}

/**
 * Extract the product table rows in source order. Rows that do not have the
 * "<qty> <description> R$ <unit> R$ <total>" shape are skipped.
 */
export function extractLineItems(text: string): LineItem[] {
  const block = PRODUCT_BLOCK_PATTERN.exec(text);
  if (!block) return [];

  const items: LineItem[] = [];
  for (const row of block[1].matchAll(PRODUCT_ROW_PATTERN)) {
    items.push({
      quantity: row[1].trim(),
      description: row[2].trim(),
      unit_price: stripCurrency(row[3]),
      line_total: stripCurrency(row[4]),
    });
  }
  return items;
}

export interface EventDetails {
  date: string;
  location: string;
}

/**
 * Event date and location share one sentence in the template and are read together.
 */
export function extractEventDetails(text: string): EventDetails | null {
  const match = EVENT_PATTERN.exec(text);
  if (!match) return null;
  return {
    date: match[1].trim(),
    location: match[2].trim(),
  };
}
