/**
 * Layer 7: Security
 *
 * Output escaping helpers.
 */

export { escapeHtml, escapeRegex } from './sanitize.ts';
