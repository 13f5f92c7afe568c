export { BuildService } from './build.service.js';
export type { IBuildOptions, IBuildResult } from './build.service.js';
export { createIndexProducerRegistry, IndexProducerRegistry } from '../assembly/producers/index.js';
export type { IIndexProducer, IProducerContext, ProducerPhase } from '../assembly/producers/index.js';
export { loadSiteConfig, parseSiteConfig } from '../config/site-config.loader.js';
export type { SiteConfig } from '../config/site-config.schema.js';
export { QuireError, ConfigurationError, ContentError, OutputCollisionError } from '../../lib/errors.js';
