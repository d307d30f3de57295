import { SpecificationField } from "../types";
import { collapseWhitespace } from "./text";

export interface RawSpecifications {
  fields: Partial<Record<SpecificationField, string>>;
  color: string[];
  connectivity: string[];
  additional_specs: Record<string, string>;
}

type SpecTarget = SpecificationField | "color" | "connectivity";

// Checked in order; a label maps to the first entry with an alias contained in it.
const SPEC_KEY_ALIASES: ReadonlyArray<readonly [SpecTarget, readonly string[]]> = [
  ["cpu", ["cpu", "chip", "chipset", "vi xử lý", "bộ vi xử lý", "processor"]],
  ["ram", ["ram", "bộ nhớ ram", "memory"]],
  ["storage", ["rom", "storage", "bộ nhớ trong", "internal storage"]],
  ["display", ["display", "screen", "màn hình"]],
  ["camera", ["camera", "camera sau", "rear camera", "camera trước", "front camera"]],
  ["battery", ["battery", "pin", "dung lượng pin"]],
  ["os", ["os", "operating system", "hệ điều hành"]],
  ["connectivity", ["kết nối", "connectivity", "connection", "network"]],
  ["color", ["color", "màu sắc", "màu", "colours"]],
  ["dimensions", ["dimensions", "kích thước"]],
  ["weight", ["weight", "cân nặng", "trọng lượng"]]
];

export function matchSpecKey(label: string): SpecTarget | undefined {
  const key = label.toLowerCase();
  for (const [target, aliases] of SPEC_KEY_ALIASES) {
    if (aliases.some((alias) => key.includes(alias))) {
      return target;
    }
  }
  return undefined;
}

function splitList(value: string): string[] {
  return value
    .split(/[,;/]/)
    .map((entry) => collapseWhitespace(entry))
    .filter((entry) => entry.length > 0);
}

/**
 * Folds scraped label/value pairs into the canonical specification fields. The first value
 * for a field wins; later labels that map to the same field are kept under additional_specs.
 */
export function mapSpecifications(pairs: Iterable<readonly [string, string]>): RawSpecifications {
  const specs: RawSpecifications = { fields: {}, color: [], connectivity: [], additional_specs: {} };

  for (const [rawKey, rawValue] of pairs) {
    const key = collapseWhitespace(rawKey).replace(/:$/, "").toLowerCase();
    const value = collapseWhitespace(rawValue);
    if (!key || !value) {
      continue;
    }

    const target = matchSpecKey(key);
    if (target === "color" || target === "connectivity") {
      for (const entry of splitList(value)) {
        if (!specs[target].includes(entry)) {
          specs[target].push(entry);
        }
      }
    } else if (target && specs.fields[target] === undefined) {
      specs.fields[target] = value;
    } else {
      specs.additional_specs[key] = value;
    }
  }

  return specs;
}

export function toSpecificationCandidate(specs: RawSpecifications): Record<string, unknown> {
  return {
    ...specs.fields,
    color: specs.color,
    connectivity: specs.connectivity,
    additional_specs: specs.additional_specs
  };
}
