import type { ResultAsync } from 'neverthrow';
import type { VersionReference } from '../domain/version-reference.js';

export type ReferenceSourceError =
  | { readonly code: 'REFERENCES_UNREADABLE'; readonly message: string }
  | { readonly code: 'REFERENCES_INVALID'; readonly message: string };

/**
 * Port: the scene-graph query.
 *
 * Returns every {identifier, version} pair referenced by a live cache consumer.
 * Recognizing which scene nodes are cache consumers is the collaborator's job.
 */
export interface ActiveReferenceSourcePort {
  list(): ResultAsync<readonly VersionReference[], ReferenceSourceError>;
}
