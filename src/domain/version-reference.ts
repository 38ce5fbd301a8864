import { z } from 'zod';

/**
 * An artifact version currently referenced by a live consumer in the scene graph.
 * Ephemeral: consumed once per matching pass.
 */
export interface VersionReference {
  readonly identifier: string;
  readonly version: string | number;
}

export const VersionReferenceSchema = z.object({
  identifier: z.string().min(1),
  version: z.union([z.string(), z.number()]),
});

export const VersionReferenceListSchema = z.array(VersionReferenceSchema);
