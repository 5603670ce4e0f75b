/**
 * CLI Error Explanation
 * Renders registry documentation for gt-lex --explain
 */

import { ERROR_REGISTRY } from './error-registry.js';

const ERROR_ID_PATTERN = /^GT-[LRC]\d{3}$/;

/**
 * Render the description, cause and resolution of a registered error.
 *
 * @param errorId - Error identifier (format: GT-{category}{3-digit})
 * @returns Formatted documentation, or null for an unknown or malformed id
 *
 * @example
 * explainError('GT-L001')
 * // GT-L001: Unterminated string
 * //
 * // Cause:
 * //   String opened with a quote but never closed before end of input.
 * // ...
 */
export function explainError(errorId: string): string | null {
  if (!ERROR_ID_PATTERN.test(errorId)) {
    return null;
  }

  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    return null;
  }

  const sections: string[] = [
    `${definition.errorId}: ${definition.description}`,
    '',
  ];

  if (definition.cause) {
    sections.push('Cause:', `  ${definition.cause}`, '');
  }

  if (definition.resolution) {
    sections.push('Resolution:', `  ${definition.resolution}`, '');
  }

  return sections.join('\n').trimEnd();
}
