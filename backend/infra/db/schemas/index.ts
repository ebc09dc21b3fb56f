export * from "./posts.js";
