export { createNodeCommand, showNodeHandler, syncNodeHandler } from './node';
export { createPodCommand, showPodHandler, invalidatePodHandler } from './pod';
