export { Metadata } from "./Metadata";
export { TracedData, type HistoryEntry } from "./TracedData";
export { readTracedDataJsonl, writeTracedDataJsonl } from "./export";
