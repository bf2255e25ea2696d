export type { FileId, NodeId } from "./ids.js";
export * from "./nodes.js";
export * from "./graph.js";
export * from "./walk.js";
export { printDeclaration, printExpression, printFragment, printItem, printName, printTypeInst } from "./print.js";
export { dumpHir, type HirDumpOptions } from "./dump.js";
