/**
 * Subroutine Injector
 * Inserts the firmware's detector calls after the filament start/end
 * comments of the executable section. Only inserts; an existing call right
 * after a trigger is left alone, so converting twice adds nothing.
 */

import { triggerPattern } from "./markers";
import type { SubroutinesConfig, TriggersConfig } from "../types";

export interface InjectionResult {
  lines: string[];
  injected: number;
  inserted: string[]; // The lines that were added, in order
}

export function injectSubroutines(
  lines: string[],
  triggers: TriggersConfig,
  subroutines: SubroutinesConfig,
): InjectionResult {
  if (!subroutines.enabled) {
    return { lines: [...lines], injected: 0, inserted: [] };
  }

  const rules = [
    { trigger: triggerPattern(triggers.filamentStart), call: subroutines.start },
    { trigger: triggerPattern(triggers.filamentEnd), call: subroutines.end },
  ];

  const out: string[] = [];
  const inserted: string[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    out.push(line);

    const rule = rules.find((r) => r.trigger.test(line));
    if (!rule) continue;

    const next = lines[i + 1];
    if (next !== undefined && next.trim() === rule.call.trim()) continue;

    out.push(rule.call);
    inserted.push(rule.call);
  }

  return { lines: out, injected: inserted.length, inserted };
}
