export type RequirementResolution =
  | { kind: 'quota'; quota: number }
  | { kind: 'not_found' }
  | { kind: 'indeterminate' }
  | { kind: 'zero' };

// First "<digits> job" in the caseworker's sentence, e.g. "Skal søge 5 jobs om måneden".
const REQUIREMENT_PATTERN = /(\d+)\s+job/i;

export function parseRequirement(text: string | null | undefined): RequirementResolution {
  if (text === null || text === undefined || text.length === 0) {
    return { kind: 'not_found' };
  }

  const match = REQUIREMENT_PATTERN.exec(text);
  if (!match) {
    return { kind: 'indeterminate' };
  }

  const quota = parseInt(match[1], 10);
  if (quota === 0) {
    return { kind: 'zero' };
  }
  return { kind: 'quota', quota };
}
