/**
 * Tag catalog.
 *
 * Artifacts may only carry tags a registry admin has added to the catalog.
 */

export const TAG_MAX_LENGTH = 32;

export interface ArtifactTag {
  tag: string;
  createdAt: string;
  /** Admin principal, or `config` for tags seeded at startup. */
  createdBy: string;
}
