/**
 * Utility for parsing the --leave option into per-contributor leave days
 */

/**
 * One parsed leave entry
 */
export interface ParsedLeaveEntry {
  /** Contributor display name as shown in the summary tables */
  contributor: string;
  days: number;
}

/**
 * Result of parsing a leave list
 */
export interface ParsedLeaveList {
  entries: ParsedLeaveEntry[];
  /** Fragments that did not have the Name=days form */
  unparsed: string[];
}

/**
 * Matches "Jane Doe=2"; the name may contain spaces but not "="
 */
const LEAVE_ENTRY_REGEX = /^([^=]+)=\s*(\d+)$/;

/**
 * Parses a comma-separated leave list
 *
 * @example
 * ```
 * parseLeaveList("Jane Doe=2, Sam=1");
 * // { entries: [{ contributor: "Jane Doe", days: 2 }, { contributor: "Sam", days: 1 }], unparsed: [] }
 * ```
 */
export function parseLeaveList(list: string): ParsedLeaveList {
  const entries: ParsedLeaveEntry[] = [];
  const unparsed: string[] = [];

  for (const fragment of list.split(",").map((part) => part.trim())) {
    if (!fragment) {
      continue;
    }

    const match = fragment.match(LEAVE_ENTRY_REGEX);
    if (match) {
      entries.push({ contributor: match[1].trim(), days: parseInt(match[2], 10) });
    } else {
      unparsed.push(fragment);
    }
  }

  return { entries, unparsed };
}
