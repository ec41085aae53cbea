/**
 * Artifact domain model.
 *
 * An artifact is a named research object (code, dataset, environment
 * snapshot) with mutable metadata and an append-only list of versions.
 */

export enum Visibility {
  Public = 'public',
  Private = 'private',
}

export interface ArtifactAuthor {
  fullName: string;
  affiliation?: string;
  email: string;
}

/** Whether readers may ask for time on the artifact's original testbed. */
export interface Reproducibility {
  enableRequests: boolean;
  /** Hours of access granted per accepted request. */
  accessHours?: number;
}

/** Client-editable metadata. */
export interface ArtifactMetadata {
  title: string;
  shortDescription: string;
  longDescription?: string;
  /** Names from the registry's tag catalog. */
  tags: string[];
  authors: ArtifactAuthor[];
  visibility: Visibility;
  /** URNs of projects the artifact belongs to. Only registry admins change these. */
  linkedProjects: string[];
  reproducibility: Reproducibility;
}

export type ArtifactPatch = Partial<ArtifactMetadata>;

export interface Artifact extends ArtifactMetadata {
  id: string;
  ownerId: string;
  /** Lets holders of the key read a private artifact without a grant. */
  sharingKey: string;
  /** Bumped on every metadata write; used for optimistic concurrency. */
  revision: number;
  /** Number of versions ever created, tombstoned ones included. */
  versionCount: number;
  /** Reproduction requests received so far. */
  reproRequests: number;
  createdAt: string;
  updatedAt: string;
}

/** Artifact as returned to clients. */
export interface ArtifactDescriptor extends ArtifactMetadata {
  id: string;
  ownerId: string;
  revision: number;
  versionCount: number;
  reproRequests: number;
  createdAt: string;
  updatedAt: string;
  sharingKey?: string;
}

export function toArtifactDescriptor(artifact: Artifact, options: { includeSharingKey: boolean }): ArtifactDescriptor {
  const { sharingKey, ...rest } = artifact;
  return options.includeSharingKey ? { ...rest, sharingKey } : rest;
}
