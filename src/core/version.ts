/**
 * Orchestrator version.
 *
 * The configuration document carries a `clusterforge_version` marker that must
 * name this release. Pre-release and build suffixes are ignored, so a document
 * written by `0.4.0-rc.1` is accepted by `0.4.0`.
 *
 * @module
 */

/**
 * Current clusterforge version.
 * This should match the version in package.json.
 */
export const ORCHESTRATOR_VERSION = "0.1.0";

const RELEASE_PATTERN = /^v?(\d+)\.(\d+)\.(\d+)(?:[-+].*)?$/;

/**
 * Reduces a version string to its `major.minor.patch` release, or undefined
 * when it is not a version.
 */
export function releaseOf(version: string): string | undefined {
  const match = RELEASE_PATTERN.exec(version.trim());
  if (!match) return undefined;
  return `${Number(match[1])}.${Number(match[2])}.${Number(match[3])}`;
}

/**
 * Whether a configuration written for `version` may be deployed by this
 * orchestrator.
 */
export function isVersionAccepted(version: string, current: string = ORCHESTRATOR_VERSION): boolean {
  const release = releaseOf(version);
  return release !== undefined && release === releaseOf(current);
}
