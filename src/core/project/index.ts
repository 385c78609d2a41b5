export * from "./project.js";
export * from "./project-repository.js";
