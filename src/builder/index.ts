/**
 * Type-directed expression builder - public exports.
 */

export { makeTypeConst } from "./type-const";
export { makeTypeTest } from "./type-test";
export { createBuilderContext, defaultRuntimeNames } from "./context";
export type { BuilderContext, BuilderOptions, RuntimeNames } from "./context";
export {
  makeBoolConst,
  makeStrConst,
  makeIntConst,
  makeNumConst,
  makeDecimalConst,
  makeCoreRef,
  makeCall,
  makeBinOp,
  makeUnOp,
  makeEqOp,
  makeLongInt,
  makeFloat32,
} from "./helpers";
