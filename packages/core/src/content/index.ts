export * from "./predicates";
export * from "./cleanup";
export * from "./classifier";
export * from "./presentation";
export * from "./renderer";
