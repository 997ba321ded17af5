/**
 * Artifacts
 *
 * Naming conventions, detection and lineage for the files an episode's
 * working directory accumulates as steps complete.
 */

export * as Store from './store';
export * as Detector from './detector';
export * as Lineage from './lineage';
export type { Detection } from './detector';

export * from './types';
