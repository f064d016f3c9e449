/**
 * tart Command Builders
 *
 * Builds argument vectors for tart subcommands. Arguments are passed to
 * spawn() directly, so no shell escaping is involved.
 */

/**
 * Arguments to list all images in JSON form.
 */
export function buildListArgs(): string[] {
  return ['list', '--format', 'json'];
}

/**
 * Arguments to clone an image into a new local VM.
 */
export function buildCloneArgs(source: string, target: string): string[] {
  return ['clone', source, target];
}

/**
 * Arguments to boot a VM headlessly.
 *
 * `tart run` stays in the foreground for the lifetime of the VM, so it is
 * spawned as a background child rather than executed.
 */
export function buildRunArgs(name: string): string[] {
  return ['run', name, '--no-graphics'];
}

/**
 * Arguments to print the VM's IP address.
 */
export function buildIpArgs(name: string): string[] {
  return ['ip', name];
}

/**
 * Arguments to stop a running VM.
 */
export function buildStopArgs(name: string): string[] {
  return ['stop', name];
}

/**
 * Arguments to delete a VM from the local store.
 */
export function buildDeleteArgs(name: string): string[] {
  return ['delete', name];
}

/**
 * Arguments to print the tart version.
 */
export function buildVersionArgs(): string[] {
  return ['--version'];
}
