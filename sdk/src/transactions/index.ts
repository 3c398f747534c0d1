export * from "./bcs.js";
export { TransactionBuilder, CLOCK_OBJECT_ID, type BuildOptions, type MoveCallInput } from "./builder.js";
export {
  MOVE_STDLIB_PACKAGE_ID,
  SUI_FRAMEWORK_PACKAGE_ID,
  SUI_COIN_TYPE,
  SUI_TYPE,
  callIdent,
  identType,
  moveStd,
  primitives,
  suiFramework,
  workflow,
  type MoveIdent,
} from "./idents.js";
export * as dag from "./dag.js";
export * as scheduler from "./scheduler.js";
export * as tool from "./tool.js";
export * as gas from "./gas.js";
export * as networkAuth from "./network-auth.js";
