import { describe, it, expect } from "vitest";
import { DEFAULT_PHONE_POLICY } from "../../src/core/normalize.js";
import { pickPhone, PHONE_STRATEGIES, type PanelSnapshot } from "../../src/core/strategies.js";

const policy = DEFAULT_PHONE_POLICY;

function panel(partial: Partial<PanelSnapshot>): PanelSnapshot {
  return { telLinks: [], emphasized: [], text: "", ...partial };
}

describe("Extraction strategies", () => {
  it("are tried tel link, then emphasized text, then free text", () => {
    expect(PHONE_STRATEGIES.map((s) => s.name)).toEqual(["tel-link", "emphasized", "text-pattern"]);
  });

  it("prefers the tel link over bold text", () => {
    const match = pickPhone(
      panel({ telLinks: ["tel:5511112222"], emphasized: ["55 3333 4444"], text: "55 3333 4444" }),
      [],
      policy
    );
    expect(match).toEqual({ phone: "55 1111 2222", strategy: "tel-link" });
  });

  it("falls back to bold text when there is no tel link", () => {
    const match = pickPhone(panel({ emphasized: ["Dr. Ruiz", "55 3333 4444"] }), [], policy);
    expect(match).toEqual({ phone: "55 3333 4444", strategy: "emphasized" });
  });

  it("falls back to the panel text last", () => {
    const match = pickPhone(panel({ text: "Llame al 55 4444 5555 de lunes a viernes" }), [], policy);
    expect(match).toEqual({ phone: "55 4444 5555", strategy: "text-pattern" });
  });

  it("skips numbers already collected and moves to the next strategy", () => {
    const match = pickPhone(
      panel({ telLinks: ["tel:55-1234-5678"], emphasized: ["55 9876 5432"] }),
      ["55 1234 5678"],
      policy
    );
    expect(match).toEqual({ phone: "55 9876 5432", strategy: "emphasized" });
  });

  it("returns undefined when nothing valid and new is found", () => {
    expect(pickPhone(panel({ telLinks: ["tel:123"], text: "sin teléfono" }), [], policy)).toBeUndefined();
    expect(pickPhone(panel({ text: "55 1234 5678" }), ["55 1234 5678"], policy)).toBeUndefined();
  });
});
