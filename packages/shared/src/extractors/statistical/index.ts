/**
 * Statistical Contract Extractor
 *
 * Fallback for contracts whose layout is unknown: a named-entity tagger finds
 * the party name and event location, light regexes find the rest. Line items
 * and payment terms are never read and are left for manual verification.
 */

import { BaseExtractor, firstGroup } from '../base-extractor';
import type { EntityTagger } from '../types';
import type { ExtractionMode, NormalizedRecord } from '../../types';
import { SENTINELS } from '../../types';
import { logger } from '../../logger';
import {
  CPF_PATTERN,
  PHONE_PATTERN,
  EMAIL_PATTERN,
  ORDER_TOTAL_PATTERN,
  EVENT_DATE_PATTERN,
  PERSON_ENTITY,
  LOCATION_ENTITY,
} from './patterns';

export class StatisticalExtractor extends BaseExtractor {
  readonly mode: ExtractionMode = 'statistical';
  readonly description = 'Unknown contract layout - entity tagging with regex support';

  constructor(private readonly tagger: EntityTagger) {
    super();
  }

  protected async extractFields(text: string): Promise<NormalizedRecord> {
    const entities = await this.tagger.tag(text);

    // First occurrence wins; several people named in one contract are not disambiguated
    const person = entities.find((e) => e.type === PERSON_ENTITY);
    const location = entities.find((e) => e.type === LOCATION_ENTITY);

    logger.debug('Entity tagging result', {
      entity_count: entities.length,
      person_found: person !== undefined,
      location_found: location !== undefined,
    });

    return {
      party: {
        name: person?.text ?? SENTINELS.NOT_FOUND,
        national_id: firstGroup(text, CPF_PATTERN) ?? SENTINELS.NOT_AVAILABLE,
        secondary_id: SENTINELS.NOT_AVAILABLE,
        phone: firstGroup(text, PHONE_PATTERN) ?? SENTINELS.NOT_AVAILABLE,
        email: firstGroup(text, EMAIL_PATTERN) ?? SENTINELS.NOT_AVAILABLE,
        address: SENTINELS.NOT_AVAILABLE,
      },
      event_date: firstGroup(text, EVENT_DATE_PATTERN) ?? SENTINELS.NOT_FOUND,
      event_location: location?.text ?? SENTINELS.NOT_FOUND,
      line_items: [],
      payment_date: SENTINELS.VERIFY_IN_DOCUMENT,
      payment_method: SENTINELS.VERIFY_IN_DOCUMENT,
      order_total: firstGroup(text, ORDER_TOTAL_PATTERN) ?? SENTINELS.NOT_FOUND,
      responsible_party: SENTINELS.NOT_AVAILABLE,
      referral_source: SENTINELS.NOT_AVAILABLE,
    };
  }
}

export * from './patterns';
export * from './tagger';
