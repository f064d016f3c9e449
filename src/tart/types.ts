/**
 * tart Types
 *
 * Type definitions for tart image-store operations and CLI responses.
 */

/**
 * Where an image lives: the local store or a pulled OCI cache entry
 */
export type TartImageSource = 'local' | 'OCI';

/**
 * VM state values reported by `tart list`
 */
export type TartVMState = 'running' | 'stopped' | 'suspended';

/**
 * Summary of an image used by the rest of vmtrial
 */
export interface ImageInfo {
  name: string;
  source: TartImageSource;
  state: TartVMState;
  diskGB: number | null;
}
