export * from "./StackResolver";
export * from "./StackResolverDefault";
