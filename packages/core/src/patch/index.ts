export * from './schema';
export * from './kube-schemas';
export * from './patch-builder';
export * from './patch-apply';
