import { ContentError, describeError } from '../../lib/errors.js';
import { isPlainObject } from '../../lib/objects.js';
import { renderSeoTags } from './seo-tags.js';
import type { ISeoOptions } from './seo-tags.js';
import { stringifyValue, TEMPLATE_FILTERS } from './template-filters.js';
import type { IFilterEnvironment } from './template-filters.js';

/**
 * Variables visible to a template, e.g. `{ site, page }` or `{ site, page, layout, content }`.
 */
export type TemplateContext = Readonly<Record<string, unknown>>;

/**
 * Where a template came from, for error messages.
 */
export interface ITemplateOrigin {
    /**
     * Document being rendered. ContentErrors are reported against it.
     */
    readonly sourcePath: string;

    /**
     * Template file when it is not the document body, e.g. `_layouts/single.html`.
     */
    readonly templatePath?: string;
}

/**
 * Tags switched on by site plugins.
 */
export interface ITemplateOptions {
    /**
     * Enable `{% seo %}`, see {@link renderSeoTags}.
     */
    readonly seo?: boolean;
}

type Lookup = { found: true; value: unknown } | { found: false };

const TOKEN = /\{\{(-?)([\s\S]*?)(-?)\}\}|\{%(-?)\s*([\s\S]*?)\s*(-?)%\}/g;
const END_RAW = /\{%-?\s*endraw\s*-?%\}/g;
const END_COMMENT = /\{%-?\s*endcomment\s*-?%\}/g;
const PATH_SEGMENT = /^[A-Za-z_][\w-]*$/;

/**
 * Split on a separator that is not inside single or double quotes.
 */
function splitOutsideQuotes(input: string, separator: string): string[] {
    const parts: string[] = [];
    let current = '';
    let quote: string | null = null;

    for (const char of input) {
        if (quote) {
            if (char === quote) {
                quote = null;
            }
            current += char;
        } else if (char === '"' || char === "'") {
            quote = char;
            current += char;
        } else if (char === separator) {
            parts.push(current);
            current = '';
        } else {
            current += char;
        }
    }
    parts.push(current);

    return parts.map(part => part.trim());
}

function lookupProperty(target: unknown, key: string): Lookup {
    if (Array.isArray(target)) {
        if (key === 'size') {
            return { found: true, value: target.length };
        }
        if (key === 'first') {
            return target.length > 0 ? { found: true, value: target[0] } : { found: false };
        }
        if (key === 'last') {
            return target.length > 0 ? { found: true, value: target[target.length - 1] } : { found: false };
        }
        const index = Number(key);
        return Number.isInteger(index) && index >= 0 && index < target.length
            ? { found: true, value: target[index] }
            : { found: false };
    }
    if (typeof target === 'string') {
        return key === 'size' ? { found: true, value: target.length } : { found: false };
    }
    if (isPlainObject(target)) {
        if (Object.prototype.hasOwnProperty.call(target, key)) {
            return { found: true, value: target[key] };
        }
        return key === 'size' ? { found: true, value: Object.keys(target).length } : { found: false };
    }
    return { found: false };
}

/**
 * Evaluates template tokens in document bodies and layouts.
 *
 * Supported syntax:
 * - `{{ path.to.value }}` and literals `{{ "text" }}`, `{{ 42 }}`
 * - Filter chains `{{ page.title | escape }}`, `{{ page.subtitle | default: "" }}`
 * - `{% raw %}…{% endraw %}` emits its content verbatim, unevaluated
 * - `{% comment %}…{% endcomment %}` emits nothing
 * - `{{-`, `-}}`, `{%-`, `-%}` trim whitespace next to the token
 * - `{% seo %}` and `{% seo title=false %}` when enabled in the options
 *
 * Evaluation is single-pass and side-effect free: substituted values are never
 * scanned for tokens again. A reference to a value that does not exist is an
 * error, never a silent blank; an explicit `null` renders as empty text.
 */
export class TemplateService {
    constructor(private readonly options: ITemplateOptions = {}) {}

    /**
     * Render a template against a context.
     *
     * @param template - Text containing template tokens
     * @param context - Variables visible to the template
     * @param origin - Document (and template file) being rendered
     * @returns Text with every token evaluated
     *
     * @throws ContentError for unresolved references, unknown filters, unsupported tags or unclosed blocks
     *
     * @example
     * service.render('Welcome to {{ site.title }}', { site: { title: 'Cloud Notes' } }, { sourcePath: 'index.md' });
     * // Returns: "Welcome to Cloud Notes"
     */
    render(template: string, context: TemplateContext, origin: ITemplateOrigin): string {
        const env = this.filterEnvironment(context);
        const output: string[] = [];
        const tokenPattern = new RegExp(TOKEN.source, 'g');
        let position = 0;
        let trimNext = false;

        const pushLiteral = (text: string) => {
            output.push(trimNext ? text.replace(/^\s+/, '') : text);
            trimNext = false;
        };
        const trimPrevious = () => {
            if (output.length > 0) {
                output[output.length - 1] = output[output.length - 1].replace(/\s+$/, '');
            }
        };

        let match: RegExpExecArray | null;
        while ((match = tokenPattern.exec(template)) !== null) {
            pushLiteral(template.slice(position, match.index));
            position = tokenPattern.lastIndex;

            if (match[2] !== undefined) {
                // Output token {{ ... }}
                if (match[1] === '-') {
                    trimPrevious();
                }
                output.push(this.evaluateOutput(match[2].trim(), context, env, origin));
                trimNext = match[3] === '-';
                continue;
            }

            // Tag token {% ... %}
            if (match[4] === '-') {
                trimPrevious();
            }
            const tagName = match[5].split(/\s+/)[0];

            if (tagName === 'raw' || tagName === 'comment') {
                const endPattern = new RegExp((tagName === 'raw' ? END_RAW : END_COMMENT).source, 'g');
                endPattern.lastIndex = position;
                const end = endPattern.exec(template);
                if (!end) {
                    throw this.error(origin, `Unclosed {% ${tagName} %} block`);
                }
                if (tagName === 'raw') {
                    output.push(template.slice(position, end.index));
                }
                position = endPattern.lastIndex;
                tokenPattern.lastIndex = position;
                trimNext = end[0].endsWith('-%}');
                continue;
            }

            if (tagName === 'seo' && this.options.seo === true) {
                output.push(renderSeoTags(context, this.seoOptions(match[5], origin)));
                trimNext = match[6] === '-';
                continue;
            }

            throw this.error(origin, `Unsupported tag "{% ${match[5]} %}"`);
        }

        const rest = template.slice(position);
        if (/\{\{|\{%/.test(rest)) {
            throw this.error(origin, 'Unclosed template token');
        }
        pushLiteral(rest);

        return output.join('');
    }

    private seoOptions(tag: string, origin: ITemplateOrigin): ISeoOptions {
        let title = true;
        for (const argument of tag.split(/\s+/).slice(1)) {
            if (argument === 'title=false') {
                title = false;
            } else {
                throw this.error(origin, `Unsupported argument "${argument}" in "{% ${tag} %}"`);
            }
        }
        return { title };
    }

    private filterEnvironment(context: TemplateContext): IFilterEnvironment {
        const site = context.site;
        if (!isPlainObject(site)) {
            return { url: '', baseurl: '' };
        }
        return {
            url: typeof site.url === 'string' ? site.url : '',
            baseurl: typeof site.baseurl === 'string' ? site.baseurl : ''
        };
    }

    private evaluateOutput(
        expression: string,
        context: TemplateContext,
        env: IFilterEnvironment,
        origin: ITemplateOrigin
    ): string {
        const [base, ...filters] = splitOutsideQuotes(expression, '|');
        const hasDefault = filters.some(filter => filter.split(':')[0].trim() === 'default');

        const lookup = this.evaluateOperand(base, context, origin);
        if (!lookup.found && !hasDefault) {
            throw this.error(origin, `Unresolved template token "{{ ${expression} }}"`);
        }

        let value = lookup.found ? lookup.value : undefined;
        for (const filter of filters) {
            const separator = filter.indexOf(':');
            const name = (separator === -1 ? filter : filter.slice(0, separator)).trim();
            const implementation = Object.hasOwn(TEMPLATE_FILTERS, name) ? TEMPLATE_FILTERS[name] : undefined;
            if (!implementation) {
                throw this.error(origin, `Unknown filter "${name}" in "{{ ${expression} }}"`);
            }

            const args = separator === -1
                ? []
                : splitOutsideQuotes(filter.slice(separator + 1), ',').map(arg => {
                    const argLookup = this.evaluateOperand(arg, context, origin);
                    if (!argLookup.found) {
                        throw this.error(origin, `Unresolved filter argument "${arg}" in "{{ ${expression} }}"`);
                    }
                    return argLookup.value;
                });

            try {
                value = implementation(value, args, env);
            } catch (error) {
                throw this.error(origin, `Filter "${name}" failed in "{{ ${expression} }}": ${describeError(error)}`);
            }
        }

        return stringifyValue(value);
    }

    private evaluateOperand(operand: string, context: TemplateContext, origin: ITemplateOrigin): Lookup {
        const quoted = /^(['"])([\s\S]*)\1$/.exec(operand);
        if (quoted) {
            return { found: true, value: quoted[2] };
        }
        if (/^-?\d+(\.\d+)?$/.test(operand)) {
            return { found: true, value: Number(operand) };
        }
        if (operand === 'true' || operand === 'false') {
            return { found: true, value: operand === 'true' };
        }
        if (operand === 'nil' || operand === 'null') {
            return { found: true, value: null };
        }

        const segments = operand.split('.');
        if (segments.some(segment => !PATH_SEGMENT.test(segment) && !/^\d+$/.test(segment))) {
            throw this.error(origin, `Invalid expression "${operand}"`);
        }

        let current: Lookup = lookupProperty(context, segments[0]);
        for (const segment of segments.slice(1)) {
            if (!current.found) {
                break;
            }
            current = lookupProperty(current.value, segment);
        }
        return current;
    }

    private error(origin: ITemplateOrigin, message: string): ContentError {
        const where = origin.templatePath ? ` in ${origin.templatePath}` : '';
        return new ContentError(origin.sourcePath, `${message}${where}`, { templatePath: origin.templatePath });
    }
}
