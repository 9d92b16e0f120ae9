/**
 * Free-form Contract Patterns
 *
 * Layout-independent regular expressions applied to the full text.
 * First match wins for each of them.
 */

/** CPF, e.g. 123.456.789-09 */
export const CPF_PATTERN = /(\d{3}\.\d{3}\.\d{3}-\d{2})/;

/** Brazilian phone, e.g. (11) 98765-4321 or 11 3456-7890 */
export const PHONE_PATTERN = /(\(?\d{2}\)?\s*\d{4,5}-?\d{4})/;

export const EMAIL_PATTERN = /([\w.-]+@[\w.-]+)/;

/**
 * "valor total" or "preço final" followed, anywhere later, by an amount.
 * Intentionally loose: the keyword may sit far before an unrelated amount.
 */
export const ORDER_TOTAL_PATTERN = /(?:valor\s*total|preço\s*final)[\s\S]*?(R\$\s*[\d.,]+)/i;

/** "data do evento:" immediately followed by dd/mm/yyyy */
export const EVENT_DATE_PATTERN = /data\s*do\s*evento[:\s]*(\d{2}\/\d{2}\/\d{4})/i;

export const PERSON_ENTITY = 'PER';
export const LOCATION_ENTITY = 'LOC';
