export * from "./schema/receiver_config_v1";
export * from "./schema/sample_v1";
export * from "./schema/receiver_stats_v1";
