export * from "./common";
export * from "./auth";
export * from "./challenges";
export * from "./campaigns";
export * from "./users";
export * from "./posts";
export * from "./chat";
