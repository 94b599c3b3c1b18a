/** Target formats a program can be exported to. */
export type ExportFormat = "LP" | "TEXT";
