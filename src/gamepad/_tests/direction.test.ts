import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { moving } from "../direction";

describe("gamepad/direction", () => {
  it("maps unit axes to directions", () => {
    expect(moving(1, 0)).toBe("right");
    expect(moving(-1, 0)).toBe("left");
    expect(moving(0, 1)).toBe("up");
    expect(moving(0, -1)).toBe("down");
    expect(moving(0, 0)).toBe("none");
  });

  it("x takes priority over y when both are non-zero", () => {
    fc.assert(
      fc.property(
        fc.double({ min: -1, max: 1, noNaN: true }).filter((x) => x !== 0),
        fc.double({ min: -1, max: 1, noNaN: true }).filter((y) => y !== 0),
        (x, y) => moving(x, y) === (x > 0 ? "right" : "left")
      )
    );
  });

  it("y alone decides when x is zero", () => {
    fc.assert(
      fc.property(fc.double({ min: -1, max: 1, noNaN: true }).filter((y) => y !== 0), (y) => moving(0, y) === (y > 0 ? "up" : "down"))
    );
  });
});
