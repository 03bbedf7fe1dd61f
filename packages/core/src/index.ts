export * from './contracts.js';
export * from './errors.js';
export * from './util/output.js';
export * from './util/time.js';
export * from './util/hash.js';
export * from './util/glob.js';
export * from './path/resolve.js';
export * from './path/interpolate.js';
export * from './assertions/evaluate.js';
export * from './contract/load.js';
export * from './executors/types.js';
export * from './executors/registry.js';
export * from './executors/node.js';
export * from './executors/shell.js';
export * from './executors/static.js';
export * from './executors/sclang.js';
export * from './runner/spec-version.js';
export * from './runner/runner.js';
export * from './paths/verify.js';
export * from './lint/lint.js';
export * from './lint/coverage.js';
export * from './analyze/source.js';
export * from './isolate/isolate.js';
