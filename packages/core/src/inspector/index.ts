export { inspectOverlay, collectWorkloads, selectPrimaryWorkload, type InspectOptions } from './overlay-inspector.js';
