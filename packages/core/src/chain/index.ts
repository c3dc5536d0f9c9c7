export {
  type ArgumentMapping,
  type ArgumentShapes,
  type ChainCallback,
  type ChainCondition,
  type HookKwargs,
  type InvocationMode,
  keywordArguments,
  positionalArguments,
  zipKeywordArgs,
} from "./arguments.js";
export { EventChain, type EventChainOptions } from "./chain.js";
export { DeferredTarget, deferred, type StageTarget, type TargetResolver } from "./deferred.js";
