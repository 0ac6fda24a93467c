/** The subset of `fetch` the upstream clients call; tests inject an in-process fake. */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export const globalFetch: FetchFn = (url, init) => fetch(url, init);
