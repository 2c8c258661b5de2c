export * from "./partition";
export * from "./VideoListResolver";
export * from "./VideoListResolverDefault";
