import path from 'node:path';

import { Liquid } from 'liquidjs';

import type { DocumentError, Item, Link, Query, Template } from './documentModel';

export interface HtmlRenderContext {
  title: string;
  href: string;
  links: Link[];
  items: Item[];
  queries: Query[];
  templates: Template[];
  error?: DocumentError;
}

/** Markup engine behind the HTML representation. */
export interface HtmlRenderer {
  render(context: HtmlRenderContext): Promise<string>;
}

export interface LiquidHtmlRendererOptions {
  templatesDir?: string;
  templateName?: string;
  cache?: boolean;
}

export const DEFAULT_TEMPLATES_DIR = path.resolve(__dirname, '..', 'templates');

export const formatFieldValue = (value: unknown): string => {
  if (value === null || value === undefined) {
    return '';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return value.map(formatFieldValue).join(', ');
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
};

export class LiquidHtmlRenderer implements HtmlRenderer {
  private readonly engine: Liquid;
  private readonly templateName: string;

  constructor(options: LiquidHtmlRendererOptions = {}) {
    this.engine = new Liquid({
      root: options.templatesDir ?? DEFAULT_TEMPLATES_DIR,
      extname: '.liquid',
      outputEscape: 'escape',
      cache: options.cache ?? true
    });
    this.engine.registerFilter('field_value', formatFieldValue);
    this.templateName = options.templateName ?? 'collection';
  }

  async render(context: HtmlRenderContext): Promise<string> {
    const html: string = await this.engine.renderFile(this.templateName, { ...context });
    return html;
  }
}
