import { createEngineLogger } from "../logger";
import { createInitialState } from "../state";
import { TransactionManager } from "../transaction";

describe("TransactionManager", () => {
  const logger = createEngineLogger("TEST");

  it("should commit a draft when the operation returns", () => {
    const tx = new TransactionManager(createInitialState(), logger);
    const result = tx.execute("bump", (draft) => {
      draft.global.totalCollateral = 5n;
      return "done";
    });

    expect(result).toBe("done");
    expect(tx.snapshot().global.totalCollateral).toBe(5n);
  });

  it("should discard the draft when the operation throws", () => {
    const tx = new TransactionManager(createInitialState(), logger);
    expect(() =>
      tx.execute("fail", (draft) => {
        draft.global.totalCollateral = 5n;
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(tx.snapshot().global.totalCollateral).toBe(0n);
    expect(tx.inTransaction).toBe(false);
  });

  it("should reject nested transactions", () => {
    const tx = new TransactionManager(createInitialState(), logger);
    expect(() => tx.execute("outer", () => tx.execute("inner", () => 1))).toThrow(
      "inner started inside outer; nested transactions are not supported",
    );
  });

  it("should never commit simulations or queries", () => {
    const tx = new TransactionManager(createInitialState(), logger);
    tx.simulate("quote", (draft) => {
      draft.global.paused = true;
    });
    tx.query((view) => {
      view.global.totalSyntheticSupply = 9n;
    });

    expect(tx.snapshot().global.paused).toBe(false);
    expect(tx.snapshot().global.totalSyntheticSupply).toBe(0n);
  });

  it("should notify listeners after each commit", () => {
    const tx = new TransactionManager(createInitialState(), logger);
    const seen: Array<[string, bigint]> = [];
    tx.onCommit((label, state) => seen.push([label, state.global.totalCollateral]));

    tx.execute("first", (draft) => {
      draft.global.totalCollateral = 1n;
    });
    expect(() => tx.execute("second", () => { throw new Error("no"); })).toThrow("no");

    expect(seen).toEqual([["first", 1n]]);
  });
});
