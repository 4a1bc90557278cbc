export * from "./types";
export { OptionStore, OptionEntry, optionValuesEqual } from "./option_store";
export { ConfigArbitrator, ConfigTargets, arbitrate, valueOf } from "./arbitrator";
