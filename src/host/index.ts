export { type HostEnvironment } from './types.js';
export { NodeHostEnvironment } from './node-host.js';
