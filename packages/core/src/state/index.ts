export * from "./active-conversation";
export * from "./animation-tracker";
