export * from "./friendly-errors";
