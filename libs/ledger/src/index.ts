export * from "./decimal";
export * from "./types";
export * from "./errors";
export * from "./calc/cost-basis";
export * from "./csv/ledger-csv";
export * from "./report/report";
