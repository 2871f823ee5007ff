import { describe, it, expect } from "vitest";
import { injectSubroutines } from "./injector";
import type { SubroutinesConfig, TriggersConfig } from "../types";

const triggers: TriggersConfig = {
  filamentStart: "; filament start gcode",
  filamentEnd: "; filament end gcode",
};

const subroutines: SubroutinesConfig = {
  enabled: true,
  start: "M981 S1 P20000 ; Enable spaghetti detector",
  end: "M981 S0 P20000 ; Disable spaghetti detector",
};

describe("injectSubroutines", () => {
  it("inserts a call after every trigger", () => {
    const result = injectSubroutines(
      [
        "; filament start gcode",
        "G1 X10",
        "; filament end gcode",
        "; filament start gcode",
        "G1 X20",
        "; filament end gcode",
      ],
      triggers,
      subroutines,
    );
    expect(result.lines).toEqual([
      "; filament start gcode",
      subroutines.start,
      "G1 X10",
      "; filament end gcode",
      subroutines.end,
      "; filament start gcode",
      subroutines.start,
      "G1 X20",
      "; filament end gcode",
      subroutines.end,
    ]);
    expect(result.injected).toBe(4);
    expect(result.inserted).toEqual([
      subroutines.start,
      subroutines.end,
      subroutines.start,
      subroutines.end,
    ]);
  });

  it("inserts after a trigger on the last line", () => {
    const result = injectSubroutines(
      ["G28", "; filament end gcode"],
      triggers,
      subroutines,
    );
    expect(result.lines).toEqual(["G28", "; filament end gcode", subroutines.end]);
  });

  it("matches whole-word triggers regardless of case", () => {
    const result = injectSubroutines(
      ["; filament start gcodes", "; FILAMENT START GCODE T1"],
      triggers,
      subroutines,
    );
    expect(result.injected).toBe(1);
    expect(result.lines[2]).toBe(subroutines.start);
  });

  it("does not insert a call that is already there", () => {
    const lines = ["; filament start gcode", subroutines.start, "G1 X10"];
    const result = injectSubroutines(lines, triggers, subroutines);
    expect(result.lines).toEqual(lines);
    expect(result.injected).toBe(0);
  });

  it("leaves the lines alone when disabled", () => {
    const lines = ["; filament start gcode", "G1 X10"];
    const result = injectSubroutines(lines, triggers, {
      ...subroutines,
      enabled: false,
    });
    expect(result).toEqual({ lines, injected: 0, inserted: [] });
    expect(result.lines).not.toBe(lines);
  });
});
