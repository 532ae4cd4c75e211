export * from "./interfaces";
export { createNodeFileSystem, createNodeHttpClient, createStaticTokenProvider } from "./node";
