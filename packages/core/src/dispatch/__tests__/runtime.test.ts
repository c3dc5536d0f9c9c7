import { beforeEach, describe, expect, it, vi } from "vitest";
import { defaultCatalog } from "../../catalog/default.js";
import { TargetKindMismatchError, UnknownEventError } from "../../errors/index.js";
import { Logger } from "../../logger/logger.js";
import { MemoryTransport } from "../../__tests__/fixtures/memory-transport.js";
import { LocalDispatcher } from "../local.js";
import { RegistrationRuntime } from "../runtime.js";

class Invoice {}

describe("RegistrationRuntime", () => {
  let dispatcher: LocalDispatcher;
  let runtime: RegistrationRuntime;

  beforeEach(() => {
    dispatcher = new LocalDispatcher();
    runtime = new RegistrationRuntime({ dispatcher, catalog: defaultCatalog() });
  });

  it("calls a saved listener for inserts and updates but not deletes", () => {
    const saved = vi.fn();
    const invoice = new Invoice();

    runtime.listen(Invoice, "after_save", saved);

    dispatcher.fire(Invoice, "after_insert", Invoice, null, invoice);
    expect(saved).toHaveBeenCalledTimes(1);

    dispatcher.fire(Invoice, "after_update", Invoice, null, invoice);
    expect(saved).toHaveBeenCalledTimes(2);

    dispatcher.fire(Invoice, "after_delete", Invoice, null, invoice);
    expect(saved).toHaveBeenCalledTimes(2);
  });

  it("passes the once flag to every primitive", () => {
    const saved = vi.fn();

    runtime.listen(Invoice, "after_save", saved, { once: true });
    dispatcher.fire(Invoice, "after_insert", Invoice, null, {});
    dispatcher.fire(Invoice, "after_insert", Invoice, null, {});
    dispatcher.fire(Invoice, "after_update", Invoice, null, {});

    expect(saved).toHaveBeenCalledTimes(2);
  });

  it("removes exactly what it installed", () => {
    const saved = vi.fn();
    const other = vi.fn();

    runtime.listen(Invoice, "after_save", saved);
    runtime.listen(Invoice, "after_insert", other);
    runtime.unlisten(Invoice, "after_save", saved);

    dispatcher.fire(Invoice, "after_insert", Invoice, null, {});

    expect(saved).not.toHaveBeenCalled();
    expect(other).toHaveBeenCalledTimes(1);
  });

  it("rejects unknown events before touching the dispatcher", () => {
    const listen = vi.spyOn(dispatcher, "listen");

    expect(() => runtime.listen(Invoice, "after_archive", vi.fn())).toThrow(UnknownEventError);
    expect(listen).not.toHaveBeenCalled();
  });

  it("looks descriptors up in its catalog", () => {
    expect(runtime.lookup("after_commit")).toEqual({ targetKind: "session", paramNames: ["session"] });
  });

  describe("target kind validation", () => {
    it("rejects a target whose kind differs from the catalog's", () => {
      const transport = new MemoryTransport();
      const validating = new RegistrationRuntime({
        dispatcher,
        catalog: defaultCatalog(),
        validateTargetKinds: true,
        logger: new Logger({ transports: [transport] }),
      });
      dispatcher.describeTarget(Invoice, "mapper");

      expect(() => validating.listen(Invoice, "after_commit", vi.fn())).toThrow(TargetKindMismatchError);
      expect(() => validating.listen(Invoice, "after_commit", vi.fn())).toThrow(
        'Event "after_commit" expects a "session" target but got "mapper"'
      );
      expect(transport.entries[0]?.level).toBe("warn");
      expect(dispatcher.hasListeners(Invoice)).toBe(false);
    });

    it("accepts matching kinds and targets of unknown kind", () => {
      const validating = new RegistrationRuntime({
        dispatcher,
        catalog: defaultCatalog(),
        validateTargetKinds: true,
      });
      dispatcher.describeTarget(Invoice, "mapper");

      validating.listen(Invoice, "after_save", vi.fn());
      validating.listen({}, "after_commit", vi.fn());

      expect(dispatcher.listenerCount(Invoice)).toBe(2);
    });

    it("is off by default", () => {
      dispatcher.describeTarget(Invoice, "mapper");
      expect(() => runtime.listen(Invoice, "after_commit", vi.fn())).not.toThrow();
    });
  });
});
