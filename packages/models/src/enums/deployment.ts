/**
 * Where a registered server runs relative to the client that launches it.
 */
export const DeploymentTypes = {
  LOCAL: 'local',
  REMOTE: 'remote',
  HYBRID: 'hybrid',
} as const;

export type DeploymentType = (typeof DeploymentTypes)[keyof typeof DeploymentTypes];

const DEPLOYMENT_VALUES: readonly string[] = Object.values(DeploymentTypes);

/**
 * Exact, case-sensitive membership check against the deployment literals.
 * @param value - Raw value read from a registry document
 */
export function isDeploymentType(value: unknown): value is DeploymentType {
  return typeof value === 'string' && DEPLOYMENT_VALUES.includes(value);
}
