export type Operator = "delete" | "yank" | "change";

export type OperatorMotion = "line" | "word" | "inner-word";

export type OperatorState = {
  operator: Operator | null;
  expectingInner: boolean;
};

/** What the key after an operator key did to the pending sequence. */
export type OperatorStep =
  | { kind: "await" }
  | { kind: "complete"; operator: Operator; motion: OperatorMotion }
  | { kind: "abandon" };

export function operatorForKey(key: string): Operator | undefined {
  switch (key) {
    case "d":
      return "delete";
    case "y":
      return "yank";
    case "c":
      return "change";
    default:
      return undefined;
  }
}

const operatorLetter: Record<Operator, string> = {
  delete: "d",
  yank: "y",
  change: "c",
};

/**
 * Tracks `d`/`y`/`c` between the operator key and the key that completes it,
 * including the `i` lookahead of `diw`, `yiw` and `ciw`.
 */
export class PendingOperator {
  private state: OperatorState = { operator: null, expectingInner: false };

  get current(): Readonly<OperatorState> {
    return this.state;
  }

  isPending(): boolean {
    return this.state.operator !== null;
  }

  begin(operator: Operator) {
    this.state = { operator, expectingInner: false };
  }

  reset() {
    this.state = { operator: null, expectingInner: false };
  }

  /** Keys typed so far, e.g. "d" or "ci". Empty when nothing is pending. */
  get label(): string {
    const { operator, expectingInner } = this.state;
    if (operator === null) return "";
    return operatorLetter[operator] + (expectingInner ? "i" : "");
  }

  /**
   * Feed the next key. Completing or abandoning resets the state; the caller
   * handles an abandoned key as an ordinary Normal-mode key.
   */
  step(key: string): OperatorStep {
    const { operator, expectingInner } = this.state;
    if (operator === null) return { kind: "abandon" };

    if (expectingInner) {
      this.reset();
      return key === "w"
        ? { kind: "complete", operator, motion: "inner-word" }
        : { kind: "abandon" };
    }

    if (key === operatorLetter[operator]) {
      this.reset();
      return { kind: "complete", operator, motion: "line" };
    }
    if (key === "w") {
      this.reset();
      return { kind: "complete", operator, motion: "word" };
    }
    if (key === "i") {
      this.state = { operator, expectingInner: true };
      return { kind: "await" };
    }

    this.reset();
    return { kind: "abandon" };
  }
}
