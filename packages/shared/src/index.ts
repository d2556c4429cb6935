export * from './digests';
export * from './hubLayout';
export * from './pathsInfoSidecar';
