export * from "./clock";
export * from "./delay";
export * from "./tokenizer";
export * from "./session";
export * from "./message-display";
