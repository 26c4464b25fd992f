/**
 * Raw ingestion records and their validation. Records arrive as flat objects
 * (from CSV rows, JSON lines, queue payloads); the shape decides the kind:
 * `head_entity` marks a relationship, `id` an entity.
 */

import { z } from 'zod';
import { normalizeId, parseEdgeType, type EdgeType, type Entity, type Relationship } from '../storage/types.js';

export type RawRecord = Record<string, unknown>;

export type ParsedRecord =
  | { kind: 'entity'; entity: Omit<Entity, 'createdAt'> }
  | { kind: 'relationship'; relationship: Relationship };

export type RecordParseResult =
  | { ok: true; record: ParsedRecord }
  | { ok: false; reason: string };

const requiredId = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .transform(normalizeId)
  .pipe(z.string().min(1, 'must not be blank'));

const confidenceField = z
  .union([
    z.number(),
    z.string().trim().min(1, 'must not be blank').transform(Number),
  ], { errorMap: () => ({ message: 'must be a number' }) })
  .pipe(z.number({ invalid_type_error: 'must parse as a number' }).min(0, 'must be >= 0').max(1, 'must be <= 1'))
  .optional()
  .transform(value => value ?? 1);

const edgeTypeField = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .transform((value, ctx): EdgeType => {
    const type = parseEdgeType(value);
    if (!type) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown edge type "${value}"` });
      return z.NEVER;
    }
    return type;
  });

const stringMap = z.record(z.string(), z.string());

const metadataField = z
  .union([
    stringMap,
    z.string().transform((value, ctx) => {
      if (value.trim() === '') return {};
      try {
        const parsed = stringMap.safeParse(JSON.parse(value));
        if (parsed.success) return parsed.data;
      } catch {
        // fall through to the issue below
      }
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a JSON object of strings' });
      return z.NEVER;
    }),
  ])
  .optional();

export const RelationshipRecordSchema = z.object({
  head_entity: requiredId,
  tail_entity: requiredId,
  edge_type: edgeTypeField,
  confidence: confidenceField,
});

export const EntityRecordSchema = z.object({
  id: requiredId,
  name: z.string().trim().optional(),
  metadata: metadataField,
});

/**
 * Validate one raw record. Never throws: malformed input yields a reason
 * the pipeline counts and samples.
 */
export function parseRecord(raw: unknown): RecordParseResult {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return { ok: false, reason: 'record must be an object' };
  }

  if ('head_entity' in raw || 'tail_entity' in raw || 'edge_type' in raw) {
    const parsed = RelationshipRecordSchema.safeParse(raw);
    if (!parsed.success) return { ok: false, reason: formatIssues(parsed.error) };
    const { head_entity, tail_entity, edge_type, confidence } = parsed.data;
    return {
      ok: true,
      record: {
        kind: 'relationship',
        relationship: { headEntity: head_entity, tailEntity: tail_entity, edgeType: edge_type, confidence },
      },
    };
  }

  if ('id' in raw) {
    const parsed = EntityRecordSchema.safeParse(raw);
    if (!parsed.success) return { ok: false, reason: formatIssues(parsed.error) };
    const { id, name, metadata } = parsed.data;
    const entity: Omit<Entity, 'createdAt'> = { id, name: name || id };
    if (metadata && Object.keys(metadata).length > 0) entity.metadata = metadata;
    return { ok: true, record: { kind: 'entity', entity } };
  }

  return { ok: false, reason: 'record is neither an entity (id) nor a relationship (head_entity)' };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')} ${issue.message}` : issue.message))
    .join('; ');
}
