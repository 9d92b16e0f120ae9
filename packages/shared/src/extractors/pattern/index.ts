/**
 * Pattern Contract Extractor
 *
 * Deterministic extraction for contracts generated from the known template.
 * Every field is matched independently; a miss leaves that field at "N/A"
 * and never stops the others.
 */

import { BaseExtractor, firstGroup } from '../base-extractor';
import type { ExtractionMode, NormalizedRecord } from '../../types';
import { SENTINELS } from '../../types';
import { logger } from '../../logger';
import {
  extractPartyFields,
  extractEmail,
  extractLineItems,
  extractEventDetails,
  orNotAvailable,
  ORDER_TOTAL_PATTERN,
  PAYMENT_DATE_PATTERN,
  PAYMENT_METHOD_PATTERN,
  RESPONSIBLE_PATTERN,
  REFERRAL_PATTERN,
} from './patterns';

/**
 * Pattern version for tracking template drift
 */
export const PATTERN_VERSION = '1.2.0';

export class PatternExtractor extends BaseExtractor {
  readonly mode: ExtractionMode = 'pattern';
  readonly description = 'System-generated contract template - anchored regex extraction';

  protected async extractFields(text: string): Promise<NormalizedRecord> {
    const party = extractPartyFields(text);
    party.email = orNotAvailable(extractEmail(text));

    const lineItems = extractLineItems(text);
    const event = extractEventDetails(text);

    const record: NormalizedRecord = {
      party,
      event_date: orNotAvailable(event?.date ?? null),
      event_location: orNotAvailable(event?.location ?? null),
      line_items: lineItems,
      payment_date: orNotAvailable(firstGroup(text, PAYMENT_DATE_PATTERN)),
      payment_method: orNotAvailable(firstGroup(text, PAYMENT_METHOD_PATTERN)),
      order_total: orNotAvailable(firstGroup(text, ORDER_TOTAL_PATTERN)),
      responsible_party: orNotAvailable(firstGroup(text, RESPONSIBLE_PATTERN)),
      referral_source: orNotAvailable(firstGroup(text, REFERRAL_PATTERN)),
    };

    logger.debug('Pattern extraction result', {
      pattern_version: PATTERN_VERSION,
      party_fields_found: Object.values(record.party).filter((v) => v !== SENTINELS.NOT_AVAILABLE).length,
      line_items: lineItems.length,
      event_found: event !== null,
    });

    return record;
  }
}

// Re-export patterns for testing
export * from './patterns';
