export { DeploymentTypes, isDeploymentType } from './deployment.js';
export type { DeploymentType } from './deployment.js';
export { TransportTypes, isTransportType, isHttpTransport } from './transport.js';
export type { TransportType } from './transport.js';
