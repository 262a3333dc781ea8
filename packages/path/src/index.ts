export {
  type GetExcelSheetNamesOptions,
  getExcelSheetNames,
  parseSheetNames,
} from "./core/excel-sheet-names"
export {
  type PreventDirectoryOverrideOptions,
  preventDirectoryOverride,
} from "./core/prevent-directory-override"
