import fs from "node:fs/promises"
import path from "node:path"
import { NotFoundError, UnsupportedFormatError } from "@app-utilities/errors"
import { createNullLogger, type Logger } from "@app-utilities/logger"
import { strFromU8, unzipSync } from "fflate"
import { isMissingPathError } from "./fs-errors"

const WORKBOOK_ENTRY = "xl/workbook.xml"
const SHEET_TAG = /<sheet\s[^>]*>/g
const NAME_ATTRIBUTE = /\sname="([^"]*)"/

const XML_ENTITIES: Readonly<Record<string, string>> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
}

export type GetExcelSheetNamesOptions = {
  /** Base directory for a relative path. @default process.cwd() */
  cwd?: string | undefined

  logger?: Logger | undefined
}

/**
 * Sheet names of an `.xlsx` workbook, in workbook order, read from
 * `xl/workbook.xml` without loading any sheet.
 *
 * @param file Path to the workbook, or its bytes.
 * @throws NotFoundError when the path does not exist.
 * @throws UnsupportedFormatError when the content is not a zip archive or has
 * no `xl/workbook.xml`.
 *
 * @example
 * ```ts
 * await getExcelSheetNames("workbook.xlsx") // ["Sheet1", "Sheet2"]
 * ```
 */
export async function getExcelSheetNames(
  file: string | Uint8Array,
  { cwd = process.cwd(), logger = createNullLogger() }: GetExcelSheetNamesOptions = {},
): Promise<string[]> {
  const label = typeof file === "string" ? path.resolve(cwd, file) : "workbook"
  const log = logger.child({ module: "path", operation: "getExcelSheetNames", file: label })
  const bytes = typeof file === "string" ? await readWorkbook(label) : file

  const names = parseSheetNames(readWorkbookXml(bytes, label))

  log.debug("sheet names read", { count: names.length })

  return names
}

async function readWorkbook(filePath: string): Promise<Uint8Array> {
  try {
    return await fs.readFile(filePath)
  } catch (err) {
    if (isMissingPathError(err)) throw new NotFoundError(filePath)
    throw err
  }
}

function readWorkbookXml(bytes: Uint8Array, label: string): string {
  let entries: Record<string, Uint8Array>

  try {
    entries = unzipSync(bytes, { filter: (entry) => entry.name === WORKBOOK_ENTRY })
  } catch (err) {
    throw new UnsupportedFormatError(label, "is not a zip archive.", err)
  }

  const workbook = entries[WORKBOOK_ENTRY]

  if (workbook === undefined) {
    throw new UnsupportedFormatError(label, `has no ${WORKBOOK_ENTRY}.`)
  }

  return strFromU8(workbook)
}

/** `name` attribute of every `<sheet>` tag, entities decoded. */
export function parseSheetNames(xml: string): string[] {
  const names: string[] = []

  for (const [tag] of xml.matchAll(SHEET_TAG)) {
    const name = NAME_ATTRIBUTE.exec(tag)?.[1]
    if (name !== undefined) names.push(decodeEntities(name))
  }

  return names
}

function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => {
    if (!body.startsWith("#")) return XML_ENTITIES[body] ?? entity

    const hex = body[1] === "x" || body[1] === "X"
    const codePoint = Number.parseInt(body.slice(hex ? 2 : 1), hex ? 16 : 10)

    return codePoint <= 0x10_ffff ? String.fromCodePoint(codePoint) : entity
  })
}
