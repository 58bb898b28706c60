export { createFluentNodeHttp } from "./node-http";
export type { FluentNodeHttpConfig } from "./node-http";
export { NodeHttpAdapter, createNodeHttpAdapter } from "./adapter";
export type { NodeHttpAdapterOptions } from "./adapter";
