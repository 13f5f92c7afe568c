import type { ILogger } from '@quire/types';
import { loadSiteConfig } from '../config/site-config.loader.js';
import type { SiteConfig } from '../config/site-config.schema.js';
import { ContentErrorPolicy } from '../content/content-error-policy.js';
import type { ISkippedDocument } from '../content/content-error-policy.js';
import { ContentReader, LAYOUTS_DIR } from '../content/content-reader.service.js';
import { validatePermalinkPattern } from '../assembly/permalink.js';
import { createIndexProducerRegistry } from '../assembly/producers/index.js';
import type { IndexProducerRegistry } from '../assembly/producers/index.js';
import { SiteAssembler } from '../assembly/site-assembler.service.js';
import { FileCacheService } from '../cache/file-cache.service.js';
import { shouldCompress } from '../emit/html-compressor.js';
import { StaticEmitter } from '../emit/static-emitter.service.js';
import { ContentTransformer } from '../render/content-transformer.service.js';
import { LayoutService } from '../render/layout.service.js';
import { MarkdownService } from '../render/markdown.service.js';
import { renderFeatures } from '../render/render-plugins.js';
import { TemplateService } from '../render/template.service.js';

/**
 * Inputs of one build, usually taken from the process environment.
 */
export interface IBuildOptions {
    readonly sourceDir: string;
    readonly destinationDir: string;

    /**
     * Build environment checked against `compress_html.ignore.envs`.
     */
    readonly siteEnv: string;

    /**
     * Overrides `skip_invalid` from `_config.yml` when set.
     */
    readonly skipInvalid?: boolean;

    /**
     * Directory of the Markdown render cache; no cache when unset.
     */
    readonly cacheDir?: string;

    /**
     * Index producers to use instead of the built-in set.
     */
    readonly registry?: IndexProducerRegistry;
}

/**
 * Summary of a successful build.
 */
export interface IBuildResult {
    readonly destination: string;
    readonly pagesWritten: number;
    readonly staticFilesCopied: number;

    /**
     * Documents left out in skip-invalid mode, with the reason.
     */
    readonly skipped: readonly ISkippedDocument[];
}

/**
 * Runs the whole pipeline: read, resolve, transform, assemble, emit.
 *
 * Configuration problems (invalid `_config.yml`, bad permalink patterns,
 * unknown or cyclic layouts) surface before any document is read. Nothing is
 * written until the whole site assembled without error, and the previous
 * output is only replaced once every file of the new one is written.
 */
export class BuildService {
    /**
     * @param logger - Logger scoped per pipeline stage
     */
    constructor(private readonly logger: ILogger) {}

    /**
     * Build a site.
     *
     * @throws ConfigurationError for invalid configuration or layouts
     * @throws ContentError for an invalid document unless skip-invalid mode is on
     * @throws OutputCollisionError if two outputs resolve to one path
     */
    async build(options: IBuildOptions): Promise<IBuildResult> {
        const buildLogger = this.logger.child({ module: 'build' });
        buildLogger.info({ source: options.sourceDir, destination: options.destinationDir }, 'Build started');

        const config = this.applyOverrides(await loadSiteConfig(options.sourceDir), options);
        this.validatePermalinks(config);

        const policy = new ContentErrorPolicy(config.skip_invalid, this.logger.child({ module: 'content' }));
        const cache = options.cacheDir
            ? new FileCacheService(options.cacheDir, this.logger.child({ module: 'cache' }))
            : undefined;

        const templates = new TemplateService({ seo: renderFeatures(config).seo });
        const layouts = await LayoutService.load(
            options.sourceDir,
            LAYOUTS_DIR,
            templates,
            this.logger.child({ module: 'layouts' })
        );
        const transformer = new ContentTransformer(config, templates, new MarkdownService(cache), layouts);

        const reader = new ContentReader(config, policy, this.logger.child({ module: 'reader' }));
        const snapshot = await reader.read(options.sourceDir, options.destinationDir);

        const assembler = new SiteAssembler(
            config,
            transformer,
            layouts,
            options.registry ?? createIndexProducerRegistry(),
            policy,
            this.logger.child({ module: 'assembler' })
        );
        const site = await assembler.assemble(snapshot);

        const emitter = new StaticEmitter(
            { compress: shouldCompress(config, options.siteEnv) },
            this.logger.child({ module: 'emitter' })
        );
        const emitted = await emitter.emit(site, options.sourceDir, options.destinationDir);

        const result: IBuildResult = { ...emitted, skipped: policy.getSkipped() };
        buildLogger.info(
            { pages: result.pagesWritten, staticFiles: result.staticFilesCopied, skipped: result.skipped.length },
            'Build finished'
        );
        return result;
    }

    private applyOverrides(config: Readonly<SiteConfig>, options: IBuildOptions): Readonly<SiteConfig> {
        if (options.skipInvalid === undefined) {
            return config;
        }
        return Object.freeze({ ...config, skip_invalid: options.skipInvalid });
    }

    /**
     * Check every permalink pattern declared in `_config.yml` up front.
     *
     * @throws ConfigurationError for the first invalid pattern
     */
    private validatePermalinks(config: Readonly<SiteConfig>): void {
        if (config.permalink) {
            validatePermalinkPattern(config.permalink);
        }
        config.defaults.forEach((entry, index) => {
            const pattern = entry.values.permalink;
            if (typeof pattern === 'string') {
                validatePermalinkPattern(pattern, `_config.yml defaults[${index}]`);
            }
        });
    }
}
