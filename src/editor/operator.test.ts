import { describe, expect, it } from "vitest";
import { operatorForKey, PendingOperator } from "./operator.js";

describe("operatorForKey", () => {
  it("maps d, y and c", () => {
    expect(operatorForKey("d")).toBe("delete");
    expect(operatorForKey("y")).toBe("yank");
    expect(operatorForKey("c")).toBe("change");
    expect(operatorForKey("x")).toBeUndefined();
  });
});

describe("PendingOperator", () => {
  it("completes a doubled operator line-wise", () => {
    const pending = new PendingOperator();
    pending.begin("yank");
    expect(pending.step("y")).toEqual({
      kind: "complete",
      operator: "yank",
      motion: "line",
    });
    expect(pending.isPending()).toBe(false);
  });

  it("does not double on a different operator letter", () => {
    const pending = new PendingOperator();
    pending.begin("delete");
    expect(pending.step("c")).toEqual({ kind: "abandon" });
  });

  it("completes word-wise on w", () => {
    const pending = new PendingOperator();
    pending.begin("change");
    expect(pending.step("w")).toEqual({
      kind: "complete",
      operator: "change",
      motion: "word",
    });
  });

  it("waits for one more key after i", () => {
    const pending = new PendingOperator();
    pending.begin("delete");
    expect(pending.step("i")).toEqual({ kind: "await" });
    expect(pending.current).toEqual({
      operator: "delete",
      expectingInner: true,
    });
    expect(pending.label).toBe("di");
    expect(pending.step("w")).toEqual({
      kind: "complete",
      operator: "delete",
      motion: "inner-word",
    });
    expect(pending.label).toBe("");
  });

  it("abandons an inner sequence on any key but w", () => {
    const pending = new PendingOperator();
    pending.begin("change");
    pending.step("i");
    expect(pending.step("d")).toEqual({ kind: "abandon" });
    expect(pending.current).toEqual({ operator: null, expectingInner: false });
  });

  it("abandons when nothing is pending", () => {
    expect(new PendingOperator().step("w")).toEqual({ kind: "abandon" });
  });
});
