/**
 * Text normalization constants
 */

/**
 * Characters stripped from names before identity hashing: punctuation,
 * quotes (ASCII and typographic) and symbol noise. Letters of any script
 * and digits are kept.
 */
export const NAME_PUNCTUATION_PATTERN = /[^\p{L}\p{N}\s]+/gu;

/**
 * Leading legal-form tokens dropped from registry names (ООО, ЧУП, ИП, ...)
 */
export const LEGAL_FORM_PATTERN =
  /^(ооо|одо|оао|зао|чуп|чтуп|уп|ип|ао|llc|ltd)\s+/u;
