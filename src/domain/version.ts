/**
 * Version domain model.
 *
 * A version is an immutable snapshot of an artifact's content. Its sequence
 * number and content reference never change; the only transition is
 * created -> tombstoned, and tombstoned is terminal.
 */

export enum VersionStatus {
  Created = 'created',
  Tombstoned = 'tombstoned',
}

/** Usage events counted against a version. */
export enum VersionEventType {
  Launch = 'launch',
  Cite = 'cite',
  Fork = 'fork',
}

export interface VersionMetrics {
  launchCount: number;
  citeCount: number;
  forkCount: number;
}

/** A pointer from a version to a related resource, e.g. the paper it backs. */
export interface VersionLink {
  urn: string;
  label: string;
  /** Set by a registry admin once the link has been checked. */
  verified: boolean;
  verifiedAt?: string;
}

export type VersionLinkInput = Pick<VersionLink, 'urn' | 'label'>;

export interface Version {
  artifactId: string;
  /** 1-based, assigned by the store, never reused. */
  sequence: number;
  contentHash: string;
  contentUrn: string;
  size: number;
  createdAt: string;
  createdBy: string;
  status: VersionStatus;
  tombstonedAt?: string;
  metrics: VersionMetrics;
  links: VersionLink[];
}

/** Fields the caller supplies when appending a version. */
export type VersionDraft = Pick<Version, 'contentHash' | 'contentUrn' | 'size' | 'createdAt' | 'createdBy' | 'links'>;

const VALID_TRANSITIONS: Record<VersionStatus, VersionStatus[]> = {
  [VersionStatus.Created]: [VersionStatus.Tombstoned],
  [VersionStatus.Tombstoned]: [],
};

export function canTransitionVersion(from: VersionStatus, to: VersionStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isLive(version: Version): boolean {
  return version.status === VersionStatus.Created;
}

export function emptyMetrics(): VersionMetrics {
  return { launchCount: 0, citeCount: 0, forkCount: 0 };
}

export const METRIC_FIELD: Record<VersionEventType, keyof VersionMetrics> = {
  [VersionEventType.Launch]: 'launchCount',
  [VersionEventType.Cite]: 'citeCount',
  [VersionEventType.Fork]: 'forkCount',
};
