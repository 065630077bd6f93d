import { describe, it, expect } from "vitest";
import { tryClaimTicket } from "../src/engine";
import { C, twoCamelSnapshot } from "./helpers";

describe("tryClaimTicket", () => {
  it("returns ok:true with the claimed position and the next snapshot", () => {
    const res = tryClaimTicket(twoCamelSnapshot({ tickets: { A: 1 } }), C("A"));

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.position).toBe(2);
    expect(res.snapshot.tickets).toEqual({ A: 2 });
  });

  it("returns EXHAUSTED_TICKETS for a 5th ticket instead of throwing", () => {
    const res = tryClaimTicket(twoCamelSnapshot({ tickets: { B: 4 } }), C("B"));
    expect(res).toEqual({
      ok: false,
      error: { code: "EXHAUSTED_TICKETS", message: "No betting tickets left for camel B." },
    });
  });

  it("returns INVALID_STATE for a broken snapshot", () => {
    const snap = twoCamelSnapshot();
    const res = tryClaimTicket({ ...snap, tickets: { A: 7 } }, C("A"));

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.code).toBe("INVALID_STATE");
    expect(res.error.message).toBe("[validateState @ claimBettingTicket] ticket count for A out of range: 7");
  });
});
