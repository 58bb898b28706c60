export { createFluentFetch } from "./fetch";
export type { FluentFetchConfig } from "./fetch";
export { FetchAdapter, createFetchAdapter } from "./adapter";
export type { FetchAdapterOptions } from "./adapter";
