import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { NotFoundError, UnsupportedFormatError } from "@app-utilities/errors"
import { strToU8, zipSync } from "fflate"
import { getExcelSheetNames, parseSheetNames } from "../excel-sheet-names"

function workbookXml(sheets: string): string {
  return [
    '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>',
    '<workbook xmlns="http://schemas.openxmlformats.org/spreadsheetml/2006/main"',
    ' xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships">',
    `<sheets>${sheets}</sheets>`,
    "</workbook>",
  ].join("")
}

function workbook(sheets: string): Uint8Array {
  return zipSync({
    "[Content_Types].xml": strToU8("<Types/>"),
    xl: {
      "workbook.xml": strToU8(workbookXml(sheets)),
      worksheets: { "sheet1.xml": strToU8("<worksheet/>") },
    },
  })
}

describe("getExcelSheetNames", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "excel-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true })
  })

  it("lists sheet names in workbook order", async () => {
    const bytes = workbook(
      '<sheet name="Sheet1" sheetId="1" r:id="rId1"/><sheet name="Totals" sheetId="2" r:id="rId2"/>',
    )

    expect(await getExcelSheetNames(bytes)).toEqual(["Sheet1", "Totals"])
  })

  it("reads a workbook from a path relative to cwd", async () => {
    await fs.writeFile(
      path.join(cwd, "report.xlsx"),
      workbook('<sheet name="Q1" sheetId="1" r:id="rId1"/>'),
    )

    expect(await getExcelSheetNames("report.xlsx", { cwd })).toEqual(["Q1"])
  })

  it("returns an empty list for a workbook without sheets", async () => {
    expect(await getExcelSheetNames(workbook(""))).toEqual([])
  })

  it("rejects with NotFoundError for a missing file", async () => {
    await expect(getExcelSheetNames("missing.xlsx", { cwd })).rejects.toThrow(
      new NotFoundError(path.join(cwd, "missing.xlsx")),
    )
  })

  it("rejects content that is not a zip archive", async () => {
    const err = await getExcelSheetNames(strToU8("plain text")).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(UnsupportedFormatError)
    expect(err).toMatchObject({ message: "workbook is not a zip archive." })
    expect(err).toHaveProperty("cause")
  })

  it("rejects an archive without xl/workbook.xml", async () => {
    const bytes = zipSync({ "readme.txt": strToU8("hello") })

    await expect(getExcelSheetNames(bytes)).rejects.toThrow("workbook has no xl/workbook.xml.")
  })
})

describe("parseSheetNames", () => {
  it("decodes XML entities in names", () => {
    const xml = workbookXml(
      '<sheet name="R&amp;D" sheetId="1"/><sheet name="&quot;Draft&quot; &lt;v2&gt;" sheetId="2"/><sheet name="&#233;t&#xE9;" sheetId="3"/>',
    )

    expect(parseSheetNames(xml)).toEqual(["R&D", '"Draft" <v2>', "été"])
  })

  it("ignores the sheets container and tags without a name", () => {
    const xml = workbookXml('<sheet sheetId="1"/><sheet name="Data" sheetId="2" state="hidden"/>')

    expect(parseSheetNames(xml)).toEqual(["Data"])
  })

  it("does not read other attributes ending in name", () => {
    expect(parseSheetNames('<sheet codename="x" name="Real"/>')).toEqual(["Real"])
  })
})
