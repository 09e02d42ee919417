/**
 * ICD-O-3 topography code rules.
 *
 * An exact rule matches one code ("C49.1"); a prefix rule matches a major
 * code and all its subdivisions ("C49" matches "C49" and "C49.1").
 */
export interface TopographyCodeRule {
  code: string;
  prefix: boolean;
}

const DECIMAL_RANGE = /^C(\d+)\.(\d+)-(?:C\d+\.)?(\d+)$/i;
const MAJOR_PART = /^C?(\d+)$/i;
const SINGLE_CODE = /^C(\d+)(?:\.(\d+))?/i;

function major(n: number): string {
  return `C${String(n).padStart(2, "0")}`;
}

/**
 * Expand a topography code expression into match rules.
 *
 *   "C10.0"        → [C10.0]
 *   "C34.1-34.9"   → [C34.1, C34.2, ..., C34.9]
 *   "C15.0-C15.9"  → [C15.0, ..., C15.9]
 *   "C53-C54-C55"  → [C53*, C54*, C55*]
 *   "C12"          → [C12*]
 *
 * Unrecognized expressions yield no rules.
 */
export function expandTopographyCode(expression: string): TopographyCodeRule[] {
  const trimmed = expression.trim();
  if (!trimmed) return [];

  const range = DECIMAL_RANGE.exec(trimmed);
  if (range) {
    const majorCode = major(parseInt(range[1], 10));
    const start = parseInt(range[2], 10);
    const end = parseInt(range[3], 10);
    const rules: TopographyCodeRule[] = [];
    for (let minor = start; minor <= end; minor++) {
      rules.push({ code: `${majorCode}.${minor}`, prefix: false });
    }
    return rules;
  }

  if (trimmed.includes("-")) {
    const parts = trimmed.split("-").map((p) => MAJOR_PART.exec(p.trim()));
    const majors: number[] = [];
    for (const part of parts) {
      if (!part) {
        majors.length = 0;
        break;
      }
      majors.push(parseInt(part[1], 10));
    }
    if (majors.length > 0) {
      const rules: TopographyCodeRule[] = [];
      for (let n = majors[0]; n <= majors[majors.length - 1]; n++) {
        rules.push({ code: major(n), prefix: true });
      }
      return rules;
    }
  }

  const single = SINGLE_CODE.exec(trimmed);
  if (single) {
    const majorCode = major(parseInt(single[1], 10));
    if (single[2] !== undefined) {
      return [{ code: `${majorCode}.${single[2]}`, prefix: false }];
    }
    return [{ code: majorCode, prefix: true }];
  }

  return [];
}

/**
 * Check whether a diagnosis topography code satisfies any rule.
 */
export function matchesTopographyCode(
  diagnosisCode: string,
  rules: readonly TopographyCodeRule[],
): boolean {
  const code = diagnosisCode.trim().toUpperCase();
  if (!code) return false;
  return rules.some((rule) =>
    rule.prefix
      ? code === rule.code || code.startsWith(`${rule.code}.`)
      : code === rule.code,
  );
}
