export interface FetchDocumentOptions {
  signal?: AbortSignal;
}

export interface PageFetcherPort {
  /** Submits the identifier on the balance page and resolves with the rendered HTML. */
  fetchDocument(identifier: string, options?: FetchDocumentOptions): Promise<string>;
}
