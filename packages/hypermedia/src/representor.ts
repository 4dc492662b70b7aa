import { COLLECTION_JSON_MEDIA_TYPE, serializeDocument } from './documentModel';
import type { CollectionDocument } from './documentModel';
import type { HtmlRenderer } from './htmlRenderer';

export const HTML_CONTENT_TYPE = 'text/html; charset=utf-8';

export type Representation = 'collection+json' | 'html';

export interface OutgoingResponse {
  representation: Representation;
  contentType: string;
  body: string;
}

export class Representor {
  constructor(
    private readonly renderer: HtmlRenderer,
    readonly mediaType: string = COLLECTION_JSON_MEDIA_TYPE
  ) {}

  /** Exact token match only; ordering and q-values are not weighed. */
  acceptsCollectionJson(accept: string | undefined): boolean {
    if (!accept) {
      return false;
    }
    return accept
      .split(',')
      .map((token) => token.trim())
      .some((token) => token === this.mediaType);
  }

  async represent(document: CollectionDocument, accept: string | undefined): Promise<OutgoingResponse> {
    const serialized = serializeDocument(document);
    if (this.acceptsCollectionJson(accept)) {
      return {
        representation: 'collection+json',
        contentType: this.mediaType,
        body: JSON.stringify(serialized)
      };
    }

    const { collection } = serialized;
    const body = await this.renderer.render({
      title: collection.title,
      href: collection.href,
      links: collection.links,
      items: collection.items,
      queries: collection.queries,
      templates: serialized.template ?? [],
      error: serialized.error
    });
    return { representation: 'html', contentType: HTML_CONTENT_TYPE, body };
  }
}
