// Zod schemas for model snapshots, persisted review state and configuration

import { z } from 'zod';

export const EntityKindSchema = z.enum(['node', 'fmea-row', 'requirement', 'architecture-element']);

export const LinkKindSchema = z.enum(['parent-child', 'connector', 'trace']);

export const RoleSchema = z.enum(['moderator', 'reviewer', 'approver']);

export const ReviewKindSchema = z.enum(['peer', 'joint']);

export const ReviewStatusSchema = z.enum(['open', 'read-only', 'approved']);

export const FieldValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const IdentifierSchema = z.string().min(1, 'Identifier is required');

/**
 * Snapshot schemas
 */
export const EntitySchema = z.object({
  id: IdentifierSchema,
  kind: EntityKindSchema,
  fields: z.record(FieldValueSchema).default({})
});

export const LinkSchema = z.object({
  source: IdentifierSchema,
  target: IdentifierSchema,
  kind: LinkKindSchema
});

export const AllocationSchema = z.object({
  entityId: IdentifierSchema,
  requirementId: IdentifierSchema
});

export const SnapshotSchema = z.object({
  version: z.string().min(1),
  entities: z.array(EntitySchema),
  links: z.array(LinkSchema).default([]),
  allocations: z.array(AllocationSchema).default([])
});

/**
 * Review state schemas (serialized form: sets as arrays, dates as ISO strings)
 */
export const ParticipantSchema = z.object({
  name: z.string().min(1, 'Participant name is required').max(100),
  email: z.string(),
  role: RoleSchema
});

export const CommentSchema = z.object({
  id: IdentifierSchema,
  author: ParticipantSchema,
  target: IdentifierSchema,
  field: z.string().optional(),
  text: z.string().min(1),
  createdAt: z.coerce.date(),
  resolved: z.boolean(),
  resolution: z.string().optional(),
  resolvedAt: z.coerce.date().optional(),
  reopens: z.string().optional()
}).refine(c => c.resolved === (c.resolution !== undefined), {
  message: 'Resolution explanation must be present exactly when the comment is resolved'
});

export const ScopeSchema = z.object({
  entityIds: z.array(IdentifierSchema),
  requirementIds: z.array(IdentifierSchema).default([])
});

export const ApprovalSchema = z.object({
  approvedBy: z.string().min(1),
  approvedAt: z.coerce.date(),
  version: z.string().min(1).nullable()
});

export const ReviewSessionSchema = z.object({
  id: IdentifierSchema,
  name: z.string().min(1).max(200),
  description: z.string(),
  kind: ReviewKindSchema,
  scope: ScopeSchema,
  participants: z.array(ParticipantSchema),
  dueDate: z.coerce.date(),
  status: ReviewStatusSchema,
  baselineSnapshotVersion: z.string().nullable(),
  completedReviewers: z.array(z.string()).default([]),
  approval: ApprovalSchema.nullable().default(null),
  comments: z.array(CommentSchema).default([]),
  createdAt: z.coerce.date()
});

export const ApprovedVersionSchema = z.object({
  snapshot: SnapshotSchema,
  sessionId: IdentifierSchema,
  approvedAt: z.coerce.date(),
  checksum: z.string().regex(/^[a-f0-9]{64}$/, 'Invalid checksum')
});

export const ReviewStateSchema = z.object({
  formatVersion: z.literal(1),
  sessions: z.array(ReviewSessionSchema).default([]),
  history: z.array(ApprovedVersionSchema).default([])
});

/**
 * Configuration file schema (.review/config.yaml)
 */
export const ConfigSchema = z.object({
  review: z.object({
    defaultDurationDays: z.number().int().positive().optional()
  }).optional(),
  diff: z.object({
    ignoredFields: z.array(z.string()).optional()
  }).optional(),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional()
  }).optional()
});

/**
 * Type exports
 */
export type SerializedSnapshot = z.infer<typeof SnapshotSchema>;
export type SerializedComment = z.infer<typeof CommentSchema>;
export type SerializedReviewSession = z.infer<typeof ReviewSessionSchema>;
export type SerializedReviewState = z.infer<typeof ReviewStateSchema>;
export type ReviewConfig = z.infer<typeof ConfigSchema>;

/**
 * Safe validation (returns result instead of throwing)
 */
export function safeValidateSnapshot(data: unknown) {
  return SnapshotSchema.safeParse(data);
}

export function safeValidateReviewState(data: unknown) {
  return ReviewStateSchema.safeParse(data);
}

export function safeValidateConfig(data: unknown) {
  return ConfigSchema.safeParse(data);
}

/**
 * Flattens zod issues into "path: message" lines
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${location}: ${issue.message}`;
  });
}
