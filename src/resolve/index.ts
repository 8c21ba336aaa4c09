export * from "./creatorCache";
export * from "./decoder";
export * from "./folder";
export * from "./postRef";
export * from "./resolver";
