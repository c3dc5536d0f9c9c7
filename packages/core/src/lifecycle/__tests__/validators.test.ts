import { beforeEach, describe, expect, it, vi } from "vitest";
import type { LocalDispatcher } from "../../dispatch/local.js";
import { createEngine, type HookChainEngine } from "../../engine.js";
import { ModelValidationError } from "../../errors/index.js";
import { Logger } from "../../logger/logger.js";
import { FakeSession, SessionRegistry } from "../../__tests__/fixtures/orm.js";
import { ModelValidators } from "../validators.js";

class Customer {
  constructor(public email: string) {}
}

class Supplier {}

const hasEmail = ({ target }: Readonly<Record<string, unknown>>): boolean =>
  target instanceof Customer && target.email.includes("@");

describe("ModelValidators", () => {
  let engine: HookChainEngine<LocalDispatcher>;
  let registry: SessionRegistry;
  let session: FakeSession;
  let validators: ModelValidators;

  beforeEach(() => {
    engine = createEngine({ logger: new Logger({ level: "fatal" }) });
    registry = new SessionRegistry();
    session = new FakeSession(engine.dispatcher, registry);
    validators = new ModelValidators(engine, registry);
  });

  it("runs validators with both stages' keyword arguments", () => {
    const validator = vi.fn(() => true);
    validators.register(Customer, "inspect", validator);
    const customer = new Customer("a@example.test");

    session.add(customer);
    session.flush();

    expect(validator).toHaveBeenCalledTimes(1);
    expect(validator).toHaveBeenCalledWith({
      mapper: Customer,
      connection: session.connection,
      target: customer,
      session,
      flush_context: { flush: 1 },
    });
  });

  it("rejects an instance when the validator returns false", () => {
    validators.register(Customer, "hasEmail", hasEmail);

    session.add(new Customer("not-an-email"));

    expect(() => session.flush()).toThrow(ModelValidationError);
  });

  it("names the model and validator in the error", () => {
    validators.register(Customer, "hasEmail", hasEmail);
    session.add(new Customer("not-an-email"));

    expect(() => session.flush()).toThrow('Validator "hasEmail" rejected Customer instance');
  });

  it("accepts valid instances on insert and update", () => {
    validators.register(Customer, "hasEmail", hasEmail);
    const customer = new Customer("a@example.test");

    session.add(customer);
    session.flush();
    customer.email = "b@example.test";
    session.touch(customer);

    expect(() => session.flush()).not.toThrow();
  });

  it("does not validate deletes under the default trigger", () => {
    const validator = vi.fn(() => false);
    const customer = new Customer("a@example.test");
    session.add(customer);
    session.flush();

    validators.register(Customer, "never", validator);
    session.delete(customer);
    session.flush();

    expect(validator).not.toHaveBeenCalled();
  });

  it("honors custom trigger and execution events", () => {
    const validator = vi.fn(() => true);
    const customer = new Customer("a@example.test");
    session.add(customer);
    session.flush();

    validators.register(Customer, "onDelete", validator, {
      triggerEvent: "after_delete",
      executionEvent: "after_commit",
    });
    session.delete(customer);
    session.commit();

    expect(validator).toHaveBeenCalledWith({
      mapper: Customer,
      connection: session.connection,
      target: customer,
      session,
    });
  });

  it("replaces a validator registered under the same name", () => {
    const first = vi.fn(() => true);
    const second = vi.fn(() => true);

    validators.register(Customer, "check", first);
    validators.register(Customer, "check", second);
    session.add(new Customer("a@example.test"));
    session.flush();

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
    expect(validators.validatorsFor(Customer)).toEqual(["check"]);
  });

  it("names chains after model and validator", () => {
    expect(validators.register(Customer, "hasEmail", hasEmail).name).toBe("Customer.hasEmail");
  });

  it("removes every validator of a model", () => {
    const validator = vi.fn(() => false);
    validators.register(Customer, "a", validator);
    validators.register(Customer, "b", validator);
    validators.register(Supplier, "c", vi.fn(() => true));

    expect(validators.remove(Customer)).toBe(2);
    expect(validators.remove(Customer)).toBe(0);
    expect(validators.validatorsFor(Customer)).toEqual([]);
    expect(validators.validatorsFor(Supplier)).toEqual(["c"]);

    session.add(new Customer("bad"));
    expect(() => session.flush()).not.toThrow();
    expect(validator).not.toHaveBeenCalled();
  });
});
