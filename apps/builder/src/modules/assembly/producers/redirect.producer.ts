import type { IRenderedPage } from '@quire/types';
import { urlToOutputPath } from '../permalink.js';
import type { IIndexProducer, IProducerContext } from './index-producer.js';
import { absoluteUrl, renderRedirect } from './markup.js';

/**
 * Redirect stubs for the old URLs a document lists in `redirect_from`.
 * The entries were checked while the document was planned.
 */
export class RedirectProducer implements IIndexProducer {
    readonly name = 'redirect-from';
    readonly aliases = ['jekyll-redirect-from'];
    readonly phase = 'content';

    async produce(context: IProducerContext): Promise<IRenderedPage[]> {
        const output: IRenderedPage[] = [];

        for (const { planned } of context.documents) {
            for (const url of planned.redirectFrom) {
                output.push({
                    kind: 'redirect',
                    origin: `generated:redirect-from:${planned.document.sourcePath}`,
                    url,
                    outputPath: urlToOutputPath(url),
                    content: renderRedirect(absoluteUrl(context.config, planned.url)),
                    sitemap: false
                });
            }
        }
        return output;
    }
}
