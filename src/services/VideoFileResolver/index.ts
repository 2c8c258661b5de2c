export * from "./VideoFileResolver";
export * from "./VideoFileResolverDefault";
