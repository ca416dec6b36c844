export type { SourceDialect, SourceDialectFactory } from './source';
export type { TargetDialect, TargetConfig } from './target';
export { createSource, listSourceSchemes, registerSource } from './source-registry';
export { createTarget, registerTarget } from './target-registry';

// Import dialects to register them
import './source/http';
import './source/s3';
import './target/postgresql';
