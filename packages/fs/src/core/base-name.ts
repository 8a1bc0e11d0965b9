/**
 * Last element of a `/`-separated path, used as the object key.
 *
 * Trailing separators are dropped; `""` yields `"."` and a path made only of
 * separators yields `"/"`.
 *
 * @remarks
 * Directory components are discarded, so `docs/a.txt` and `img/a.txt` both
 * address the key `a.txt`. Only one flat key space per bucket is reachable.
 */
export function baseName(path: string): string {
  if (path === "") return "."

  let end = path.length
  while (end > 0 && path[end - 1] === "/") end--

  if (end === 0) return "/"

  const trimmed = path.slice(0, end)
  return trimmed.slice(trimmed.lastIndexOf("/") + 1)
}
