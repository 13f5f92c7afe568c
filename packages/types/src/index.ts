export type { ILogger } from './logging/ILogger.js';
export type { ICacheService } from './services/ICacheService.js';
export type {
    FrontMatter,
    CollectionName,
    DocumentMarkup,
    IDocument,
    IStaticFile
} from './content/IDocument.js';
export type { RenderedPageKind, IRenderedPage } from './content/IRenderedPage.js';
export { SITE_SKINS, isSiteSkin } from './theme/skins.js';
export type { SiteSkin, DiagramTheme } from './theme/skins.js';
