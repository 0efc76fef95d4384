/** The subset of the global `fetch` the HTTP adapters call; tests pass a fake. */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;
