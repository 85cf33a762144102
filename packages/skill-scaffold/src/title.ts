/**
 * Display title for a hyphen-case skill name: every segment capitalized and
 * joined with single spaces. Empty segments stay empty, so `x--y` keeps a
 * double space.
 */
export function deriveSkillTitle(skillName: string): string {
  return skillName
    .split("-")
    .map((segment) => capitalize(segment))
    .join(" ");
}

// Code points, not UTF-16 units.
function capitalize(segment: string): string {
  const [first, ...rest] = [...segment];
  if (first === undefined) {
    return segment;
  }
  return first.toUpperCase() + rest.join("").toLowerCase();
}
