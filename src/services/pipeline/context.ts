/**
 * Formats retrieved schema documents into the context block of the generation prompt.
 */

import type { RetrievedDocument } from '../../types/models.js';
import { ContextAssemblyError } from '../../types/errors.js';
import { toSimilarity, type DistanceMetric } from './distance.js';

export const CONTEXT_SEPARATOR = '---';

/**
 * One block per document in rank order: relevance line, content, separator.
 *
 * @throws ContextAssemblyError when `retrieved` is empty
 */
export function assembleContext(
  retrieved: readonly RetrievedDocument[],
  metric: DistanceMetric = 'cosine'
): string {
  if (retrieved.length === 0) {
    throw new ContextAssemblyError('Cannot assemble schema context from zero documents');
  }

  const parts: string[] = [];
  for (const { document, distance } of retrieved) {
    parts.push(`Relevance Score: ${toSimilarity(distance, metric).toFixed(2)}`);
    parts.push(document.content);
    parts.push(CONTEXT_SEPARATOR);
  }
  return parts.join('\n');
}
