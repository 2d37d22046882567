/**
 * Turns per-block heading levels into section ids.
 *
 * A new section starts at a block whose level is at or above the pivot and
 * differs from the level of the block before it. Ids start at 0 and never
 * decrease.
 */
export function assignSectionIds(levels: readonly number[], pivotLevel: number): number[] {
  const sectionIds: number[] = [];
  let sectionId = 0;
  levels.forEach((level, index) => {
    if (index > 0 && level <= pivotLevel && level !== levels[index - 1]) {
      sectionId++;
    }
    sectionIds.push(sectionId);
  });
  return sectionIds;
}
