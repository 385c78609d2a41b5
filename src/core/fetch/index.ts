export * from "./stack-exchange-client.js";
export * from "./stack-overflow.js";
