import type { CustomFieldValue } from "../types";

const ABSENT: CustomFieldValue = { kind: "absent" };

function optionText(value: unknown): string | null {
  return typeof value === "string" && value.length > 0 ? value : null;
}

/**
 * Resolves a custom field's raw JSON into a tagged value. Jira returns a
 * select option object, a list (multi-select, labels-like fields) or a
 * plain scalar depending on the field type.
 */
export function parseCustomFieldValue(raw: unknown): CustomFieldValue {
  if (raw === null || raw === undefined) {
    return ABSENT;
  }

  if (Array.isArray(raw)) {
    const first: unknown = raw[0];
    return raw.length > 0 ? { kind: "list", first: parseCustomFieldValue(first) } : ABSENT;
  }

  if (typeof raw === "object") {
    const option: Map<string, unknown> = new Map(Object.entries(raw));
    return {
      kind: "option",
      value: optionText(option.get("value")),
      name: optionText(option.get("name")),
    };
  }

  return { kind: "scalar", text: String(raw) };
}

/**
 * Text compared against the configured categories, uppercased.
 * Options prefer `value` over `name`; lists use their first element.
 */
export function customFieldText(field: CustomFieldValue): string {
  switch (field.kind) {
    case "option":
      return (field.value ?? field.name ?? "").toUpperCase();
    case "list":
      return customFieldText(field.first);
    case "scalar":
      return field.text.toUpperCase();
    case "absent":
      return "";
  }
}
