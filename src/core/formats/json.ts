/**
 * JSON graph documents: `{ nodes: [...], edges: [...] }`.
 */

import { z } from 'zod';
import { InvalidInputError } from '../errors';
import type { LabelGraph } from '../graph/label-graph';

const propertiesSchema = z.record(z.string(), z.unknown());

export const graphDocumentSchema = z.object({
  nodes: z
    .array(
      z.object({
        label: z.string().min(1),
        type: z.string().nullable().optional(),
        properties: propertiesSchema.optional()
      })
    )
    .default([]),
  edges: z
    .array(
      z.object({
        source: z.string().min(1),
        target: z.string().min(1),
        relation: z.string().min(1),
        properties: propertiesSchema.optional()
      })
    )
    .default([])
});

export type GraphDocument = z.infer<typeof graphDocumentSchema>;

export function exportJson(graph: LabelGraph): string {
  const document: GraphDocument = {
    nodes: graph.nodes().map(({ label, type, properties }) => ({ label, type, properties })),
    edges: graph.edges().map(({ source, target, relation, properties }) => ({
      source,
      target,
      relation,
      properties
    }))
  };
  return JSON.stringify(document, null, 2);
}

/**
 * @throws InvalidInputError on malformed JSON or a document that fails validation
 */
export function parseJson(content: string): GraphDocument {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    throw new InvalidInputError(`Invalid JSON: ${error.message}`, error);
  }

  const result = graphDocumentSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidInputError(`Invalid graph document: ${issues.join('; ')}`, result.error);
  }
  return result.data;
}
