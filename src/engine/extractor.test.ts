import { describe, it, expect } from "vitest";
import { classifyLines } from "./classifier";
import { extractMetadata } from "./extractor";
import { loadDefaultConfig } from "../utils/load-config";

async function extract(...lines: string[]) {
  const { markers } = await loadDefaultConfig();
  return extractMetadata(classifyLines(lines, markers));
}

describe("extractMetadata", () => {
  describe("summary fields", () => {
    it("reads the slicer's summary comments", async () => {
      const { fields, warnings } = await extract(
        "; filament used [mm] = 1234.56",
        "; filament used [cm3] = 2.97",
        "; filament used [g] = 3.68",
        "; filament cost = 0.07",
        "; total layers count = 3",
        "; estimated printing time (normal mode) = 1h 2m 3s",
        "; estimated first layer printing time (normal mode) = 45s",
      );
      expect(fields).toEqual({
        filament_length_mm: { kind: "quantity", value: 1234.56, unit: "mm" },
        filament_volume_cm3: { kind: "quantity", value: 2.97, unit: "cm3" },
        filament_mass_g: { kind: "quantity", value: 3.68, unit: "g" },
        filament_cost: { kind: "quantity", value: 0.07, unit: "currency" },
        layer_count: { kind: "count", value: 3 },
        estimated_time: { kind: "duration", seconds: 3723 },
        first_layer_time: { kind: "duration", seconds: 45 },
      });
      expect(warnings).toEqual([]);
    });

    it("sums per-extruder values", async () => {
      const { fields } = await extract(
        "; filament used [mm] = 100.5, 20.25",
        "; filament cost = 0.10, 0.20",
      );
      expect(fields.filament_length_mm).toEqual({
        kind: "quantity",
        value: 120.75,
        unit: "mm",
      });
      expect(fields.filament_cost).toEqual({
        kind: "quantity",
        value: 0.3,
        unit: "currency",
      });
    });

    it("converts source units to the canonical unit", async () => {
      const { fields } = await extract(
        "; filament used [m] = 1.5",
        "; filament used [mm3] = 2500",
        "; total filament used [kg] = 0.25",
      );
      expect(fields.filament_length_mm).toEqual({
        kind: "quantity",
        value: 1500,
        unit: "mm",
      });
      expect(fields.filament_volume_cm3).toEqual({
        kind: "quantity",
        value: 2.5,
        unit: "cm3",
      });
      expect(fields.filament_mass_g).toEqual({
        kind: "quantity",
        value: 250,
        unit: "g",
      });
    });

    it("reads the total time from the header form", async () => {
      const { fields } = await extract(
        "; model printing time: 1h 2m; total estimated time: 1h 5m 0s",
      );
      expect(fields.estimated_time).toEqual({ kind: "duration", seconds: 3900 });
    });
  });

  describe("config fields", () => {
    it("takes the first extruder's value", async () => {
      const { fields } = await extract(
        "; CONFIG_BLOCK_START",
        "; nozzle_temperature = 215,230",
        "; sparse_infill_density = 20%",
        "; outer_wall_speed = 200",
        "; travel_speed = 500",
        "; CONFIG_BLOCK_END",
      );
      expect(fields).toEqual({
        nozzle_temp: { kind: "quantity", value: 215, unit: "celsius" },
        infill_percent: { kind: "quantity", value: 20, unit: "percent" },
        print_speed: { kind: "quantity", value: 200, unit: "mm/s" },
        travel_speed: { kind: "quantity", value: 500, unit: "mm/s" },
      });
    });

    it("reads the generator without its timestamp", async () => {
      const { fields } = await extract(
        "; HEADER_BLOCK_START",
        "; generated by OrcaSlicer 2.1.1 on 2024-08-01 at 10:00:00",
        "; HEADER_BLOCK_END",
      );
      expect(fields.generator).toEqual({
        kind: "string",
        value: "OrcaSlicer 2.1.1",
      });
    });
  });

  describe("scope", () => {
    it("ignores setting comments in the executable section", async () => {
      const { fields } = await extract(
        "; EXECUTABLE_BLOCK_START",
        "; layer_height = 0.3",
        "G28",
        "; EXECUTABLE_BLOCK_END",
        "G1 X10",
        "; printer_model = Other",
      );
      expect(fields).toEqual({});
    });

    it("reads summary comments left inside the executable section", async () => {
      const { fields } = await extract(
        "; EXECUTABLE_BLOCK_START",
        "G28",
        "; total layers count = 7",
        "; EXECUTABLE_BLOCK_END",
      );
      expect(fields).toEqual({ layer_count: { kind: "count", value: 7 } });
    });

    it("reads the preamble", async () => {
      const { fields } = await extract("; filament_type = PETG", "G28");
      expect(fields.filament_type).toEqual({ kind: "string", value: "PETG" });
    });
  });

  describe("warnings", () => {
    it("skips a value that does not parse and keeps the earlier one", async () => {
      const { fields, warnings } = await extract(
        "; HEADER_BLOCK_START",
        "; total layer number: 5",
        "; HEADER_BLOCK_END",
        "; total layers count = lots",
      );
      expect(fields.layer_count).toEqual({ kind: "count", value: 5 });
      expect(warnings).toEqual([
        {
          reason: "unparseable-value",
          field: "layer_count",
          line: 4,
          text: "; total layers count = lots",
        },
      ]);
    });

    it("flags conflicting values and keeps the last one", async () => {
      const { fields, warnings } = await extract(
        "; HEADER_BLOCK_START",
        "; total layer number: 3",
        "; HEADER_BLOCK_END",
        "; total layers count = 4",
      );
      expect(fields.layer_count).toEqual({ kind: "count", value: 4 });
      expect(warnings).toEqual([
        {
          reason: "conflicting-value",
          field: "layer_count",
          line: 4,
          text: "; total layers count = 4",
        },
      ]);
    });

    it("does not flag a repeated equal value", async () => {
      const { warnings } = await extract(
        "; filament used [g] = 3.68",
        "; total filament used [g] = 3.68",
      );
      expect(warnings).toEqual([]);
    });
  });
});
