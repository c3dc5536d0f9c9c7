export {
  type AfterPersistOptions,
  afterDelete,
  afterInsert,
  afterSave,
  afterTouch,
  afterUpdate,
  type BeforeFlushCallback,
  type BeforeFlushOptions,
  beforeDelete,
  beforeInsert,
  beforeSave,
  beforeTouch,
  beforeUpdate,
  DEFAULT_EXECUTION_EVENT,
  owningUnitOfWork,
  type PendingListener,
} from "./helpers.js";
export {
  type Model,
  type PendingState,
  pendingInstances,
  type UnitOfWork,
  type UnitOfWorkLocator,
} from "./unit-of-work.js";
export { type ModelValidator, ModelValidators, type ValidatorOptions } from "./validators.js";
