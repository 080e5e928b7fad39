/**
 * Keyword patterns used to detect licensing requirements and bot accounts.
 *
 * Patterns are matched with RegExp.test against single lines or single
 * API fields, so none of them carries the global flag.
 */

/**
 * Contributor License Agreement indicators.
 */
export const CLA_PATTERNS: readonly RegExp[] = [
  /contribut(or|ion)s? licens(e|ing) agreement/i,
  // clear-cut appearance of CLA or CLAs
  /\bCLAs?\b/,
  // cla-assistant status context
  /license\/cla/,
  // GitHub App status context
  /cla-bot/,
];

/**
 * Developer Certificate of Origin indicators.
 */
export const DCO_PATTERNS: readonly RegExp[] = [
  /developers? certificate of origin/i,
  /\bDCO\b/,
  /Signed-off-by/,
];

/**
 * Inbound=outbound licensing statements.
 */
export const INOUTBOUND_PATTERNS: readonly RegExp[] = [/inbound *= *outbound/i];

/**
 * Names of accounts that are known bots. Applied to contributor logins and commit author names.
 */
export const BOT_NAME_PATTERNS: readonly RegExp[] = [
  /^renovate/i,
  /^dependabot/i,
  /^weblate$/i,
  /\[bot\]$/i,
];
