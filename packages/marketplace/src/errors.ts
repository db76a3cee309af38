export class MissingItemUrlError extends Error {
  constructor(readonly itemId: string | undefined) {
    super(`Item ${itemId ?? '(without id)'} has no page URL to fetch.`);
    this.name = 'MissingItemUrlError';
  }
}

export class PageStructureError extends Error {
  constructor(readonly url: string) {
    super(`Page ${url} did not match any known item detail selectors.`);
    this.name = 'PageStructureError';
  }
}

export class RenderError extends Error {
  constructor(
    readonly url: string,
    reason: string
  ) {
    super(`Failed to render ${url}: ${reason}`);
    this.name = 'RenderError';
  }
}
