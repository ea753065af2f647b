export * from "./types";
export * from "./document_adapter";
export * from "./document_store";
export * from "./ranker";
