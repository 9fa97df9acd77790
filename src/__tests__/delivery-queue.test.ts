import { describe, it, expect } from "vitest";
import { DeliveryQueue } from "../delivery-queue.js";

const msg = (text: string) => ({ text, alert: null });

describe("DeliveryQueue", () => {
  it("is first in, first out", () => {
    const queue = new DeliveryQueue({ sessionId: "s1" });
    queue.push(msg("a"));
    queue.push(msg("b"));
    queue.push(msg("c"));

    expect(queue.tryShift()?.text).toBe("a");
    expect(queue.tryShift()?.text).toBe("b");
    expect(queue.tryShift()?.text).toBe("c");
    expect(queue.tryShift()).toBeUndefined();
  });

  it("keeps order across compaction", () => {
    const queue = new DeliveryQueue({ sessionId: "s1" });
    for (let i = 0; i < 200; i++) queue.push(msg(String(i)));

    const out: string[] = [];
    for (let i = 0; i < 150; i++) out.push(queue.tryShift()?.text ?? "");
    for (let i = 200; i < 210; i++) queue.push(msg(String(i)));
    for (let message = queue.tryShift(); message; message = queue.tryShift()) out.push(message.text);

    expect(out).toEqual(Array.from({ length: 210 }, (_, i) => String(i)));
  });

  it("refuses pushes once closed and drops pending messages", () => {
    const queue = new DeliveryQueue({ sessionId: "s1" });
    queue.push(msg("pending"));
    queue.close();
    queue.close();

    expect(queue.push(msg("late"))).toBe(false);
    expect(queue.size).toBe(0);
    expect(queue.tryShift()).toBeUndefined();
  });
});
