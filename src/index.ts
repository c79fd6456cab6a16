export * from "./avl-tree";
export * from "./dump";
export * from "./errors";
export * from "./nodes";
export * from "./ordering";
export * from "./prioritize";
export * from "./rotations";
