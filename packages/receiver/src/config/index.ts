export * from "./dotenv";
export * from "./repo_root";
export * from "./receiver_config";
