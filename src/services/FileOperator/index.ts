export * from "./FileOperator";
export * from "./FileOperatorNode";
