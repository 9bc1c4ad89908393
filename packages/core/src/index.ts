export * as Config from "./config_manager";
export * as Dataset from "./dataset_loader";
export * as Dates from "./calendar_date";
export * as Engine from "./status_engine";
export * as Logger from "./logger";
export * as Releases from "./distro_release";
export * as Sources from "./dataset_source";
export * as Versions from "./version_order";

// Most callers only need the facade
export { DistroInfo } from "./status_engine";
