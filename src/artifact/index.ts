export * from "./artifactType";
