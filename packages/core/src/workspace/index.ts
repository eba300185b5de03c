export { Workspace } from './workspace';
export { UpstreamNotFoundError } from './errors';
export type { UpstreamInfo } from './workspace.types';
