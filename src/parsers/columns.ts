/**
 * Column naming shared by the MDM and WPro tables.
 */

/**
 * Rename repeated column names so every name is unique: the second `ID`
 * becomes `ID.1`, the third `ID.2`. A generated name that is already taken
 * gets another suffix (`A`, `A`, `A.1` → `A`, `A.1`, `A.1.1`).
 */
export const uniqueColumnNames = (names: readonly string[]): string[] => {
  const counts = new Map<string, number>();

  return names.map((name) => {
    let column = name;
    let count = counts.get(column) ?? 0;
    while (count > 0) {
      counts.set(column, count + 1);
      column = `${column}.${count}`;
      count = counts.get(column) ?? 0;
    }
    counts.set(column, count + 1);
    return column;
  });
};
