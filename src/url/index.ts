export * from "./url";
