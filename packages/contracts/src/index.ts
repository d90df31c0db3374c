export * from "./schema/mining_config_v1";
export * from "./schema/mining_request_v1";
export * from "./schema/mining_result_v1";
