import { baseName } from "../base-name"

describe("baseName", () => {
  it.each([
    ["report.csv", "report.csv"],
    ["/report.csv", "report.csv"],
    ["docs/2024/report.csv", "report.csv"],
    ["docs/2024/", "2024"],
    ["//", "/"],
    ["", "."],
  ])("%j -> %j", (input, expected) => {
    expect(baseName(input)).toBe(expected)
  })

  it("maps paths that differ only in directory to the same key", () => {
    expect(baseName("img/a.png")).toBe(baseName("thumbs/a.png"))
  })
})
