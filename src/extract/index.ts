export * from "./extractor";
export * from "./selectRecords";
