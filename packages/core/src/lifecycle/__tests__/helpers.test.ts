import { beforeEach, describe, expect, it, vi } from "vitest";
import { createEngine, type HookChainEngine } from "../../engine.js";
import type { LocalDispatcher } from "../../dispatch/local.js";
import { ChainStateError, DetachedInstanceError } from "../../errors/index.js";
import { Logger } from "../../logger/logger.js";
import { FakeSession, SessionRegistry } from "../../__tests__/fixtures/orm.js";
import {
  afterDelete,
  afterInsert,
  afterSave,
  afterTouch,
  afterUpdate,
  beforeDelete,
  beforeInsert,
  beforeSave,
  beforeTouch,
  beforeUpdate,
} from "../helpers.js";
import { pendingInstances } from "../unit-of-work.js";

class User {
  constructor(public email: string) {}
}

class Order {}

describe("lifecycle helpers", () => {
  let engine: HookChainEngine<LocalDispatcher>;
  let registry: SessionRegistry;
  let session: FakeSession;

  beforeEach(() => {
    engine = createEngine({ logger: new Logger({ level: "fatal" }) });
    registry = new SessionRegistry();
    session = new FakeSession(engine.dispatcher, registry);
  });

  /** Put `user` through the flushes that precede the operation under test */
  const prepare: Record<"insert" | "update" | "delete", (user: User) => void> = {
    insert: () => {},
    update: (user) => {
      session.add(user);
      session.flush();
      user.email = "changed@example.test";
      session.touch(user);
    },
    delete: (user) => {
      session.add(user);
      session.flush();
      session.delete(user);
    },
  };

  const perform: Record<"insert" | "update" | "delete", (user: User) => void> = {
    insert: (user) => {
      session.add(user);
      session.flush();
    },
    update: () => session.flush(),
    delete: () => session.flush(),
  };

  describe.each([
    { operation: "insert", helper: afterInsert },
    { operation: "update", helper: afterUpdate },
    { operation: "delete", helper: afterDelete },
  ] as const)("after $operation", ({ operation, helper }) => {
    it("calls back once the owning session finishes the flush", () => {
      const callback = vi.fn();
      const user = new User("someone@example.test");
      prepare[operation](user);

      helper(engine, User, { locator: registry }).apply(callback);
      perform[operation](user);

      expect(callback).toHaveBeenCalledTimes(1);
      expect(callback).toHaveBeenCalledWith(User, session.connection, user, session, { flush: expect.any(Number) });
    });

    it("ignores instances of other models", () => {
      const callback = vi.fn();
      helper(engine, Order, { locator: registry }).apply(callback);

      const user = new User("someone@example.test");
      prepare[operation](user);
      perform[operation](user);

      expect(callback).not.toHaveBeenCalled();
    });
  });

  it("runs the tail on the flush's own post-exec, not a later one", () => {
    const seen: unknown[] = [];
    afterInsert(engine, User, { locator: registry }).apply((...args) => seen.push(args[4]));

    session.add(new User("a@example.test"));
    session.flush();
    session.add(new Order());
    session.flush();

    expect(seen).toEqual([{ flush: 1 }]);
  });

  it("calls after save for inserts and updates but not deletes", () => {
    const callback = vi.fn();
    afterSave(engine, User, { locator: registry }).apply(callback);
    const user = new User("a@example.test");

    session.add(user);
    session.flush();
    expect(callback).toHaveBeenCalledTimes(1);

    session.touch(user);
    session.flush();
    expect(callback).toHaveBeenCalledTimes(2);

    session.delete(user);
    session.flush();
    expect(callback).toHaveBeenCalledTimes(2);
  });

  it("calls after touch for deletes too", () => {
    const callback = vi.fn();
    afterTouch(engine, User, { locator: registry }).apply(callback);
    const user = new User("a@example.test");

    session.add(user);
    session.flush();
    session.delete(user);
    session.flush();

    expect(callback).toHaveBeenCalledTimes(2);
  });

  it("honors a custom execution event", () => {
    const callback = vi.fn();
    afterInsert(engine, User, { locator: registry, executionEvent: "after_commit" }).apply(callback);
    const user = new User("a@example.test");

    session.add(user);
    session.commit();

    expect(callback).toHaveBeenCalledWith(User, session.connection, user, session);
  });

  it("honors a fixed execution target", () => {
    const callback = vi.fn();
    const audit = new FakeSession(engine.dispatcher, registry);
    afterInsert(engine, User, { executionTarget: audit, executionEvent: "after_commit" }).apply(callback);

    session.add(new User("a@example.test"));
    session.commit();
    expect(callback).not.toHaveBeenCalled();

    engine.dispatcher.fire(audit, "after_commit", audit);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it("needs a locator or an execution target", () => {
    expect(() => afterInsert(engine, User)).toThrow(ChainStateError);
  });

  it("throws when the fired instance has no unit of work", () => {
    afterInsert(engine, User, { locator: registry }).apply(vi.fn());

    expect(() => engine.dispatcher.fire(User, "after_insert", User, null, new User("x@example.test"))).toThrow(
      DetachedInstanceError
    );
  });

  describe("before flush", () => {
    it("visits each new instance of the model", () => {
      const callback = vi.fn();
      beforeInsert(engine, User, session).apply(callback);
      const first = new User("a@example.test");
      const second = new User("b@example.test");

      session.add(first);
      session.add(new Order());
      session.add(second);
      session.flush();

      expect(callback.mock.calls).toEqual([
        [session, { flush: 1 }, null, first],
        [session, { flush: 1 }, null, second],
      ]);
    });

    it("visits dirty instances for updates and deleted ones for deletes", () => {
      const updated = vi.fn();
      const deleted = vi.fn();
      const user = new User("a@example.test");
      const other = new User("b@example.test");
      session.add(user);
      session.add(other);
      session.flush();

      beforeUpdate(engine, User, session).apply(updated);
      beforeDelete(engine, User, session).apply(deleted);
      session.touch(user);
      session.delete(other);
      session.flush();

      expect(updated).toHaveBeenCalledTimes(1);
      expect(updated.mock.calls[0]?.[3]).toBe(user);
      expect(deleted).toHaveBeenCalledTimes(1);
      expect(deleted.mock.calls[0]?.[3]).toBe(other);
    });

    it("combines states for save and touch", () => {
      const saved = vi.fn();
      const touched = vi.fn();
      const existing = new User("a@example.test");
      const doomed = new User("b@example.test");
      session.add(existing);
      session.add(doomed);
      session.flush();

      beforeSave(engine, User, session).apply(saved);
      beforeTouch(engine, User, session).apply(touched);
      session.add(new User("c@example.test"));
      session.touch(existing);
      session.delete(doomed);
      session.flush();

      expect(saved).toHaveBeenCalledTimes(2);
      expect(touched).toHaveBeenCalledTimes(3);
    });

    it("stops after the first flush when once is set", () => {
      const callback = vi.fn();
      beforeInsert(engine, User, session, { once: true }).apply(callback);

      session.add(new User("a@example.test"));
      session.flush();
      session.add(new User("b@example.test"));
      session.flush();

      expect(callback).toHaveBeenCalledTimes(1);
    });

    it("names the chain after the callback", () => {
      function stampCreatedAt(): void {}
      expect(beforeInsert(engine, User, session).apply(stampCreatedAt).name).toBe("stampCreatedAt");
    });
  });
});

describe("pendingInstances()", () => {
  it("filters by model and lists each instance once", () => {
    const user = new User("a@example.test");
    const order = new Order();

    expect(
      pendingInstances({ new: [user, order], dirty: [user], deleted: [] }, User, ["new", "dirty", "deleted"])
    ).toEqual([user]);
  });
});
