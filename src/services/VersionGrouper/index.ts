export * from "./EpisodeVersionGrouper";
export * from "./MovieVersionGrouper";
export * from "./VersionGrouper";
export * from "./versionOrder";
