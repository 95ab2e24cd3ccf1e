export * from "./documentId";
