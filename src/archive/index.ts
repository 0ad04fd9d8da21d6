export * from "./archiveWriter";
export * from "./naming";
