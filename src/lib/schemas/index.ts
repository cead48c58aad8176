export * from "./template-structure.schema";
