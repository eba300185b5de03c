export * as BoardAdapter from "./adapters/board_adapter";
export * as CommonsStore from "./commons_store";
export * as Wanted from "./wanted";
export * as Workspace from "./workspace";
export * as Config from "./config_manager";
export * as Logger from "./logger";
export * as Schemas from "./schemas";
// Input and config validation
export * as Validation from "./validation";
export * as EventBus from "./event_bus";
export * as Utils from "./utils";
