import { CANONICAL_COLUMNS, type CanonicalRecord } from "../schema/canonical.js"

const toOrderedObject = (record: CanonicalRecord): Record<string, unknown> =>
  Object.fromEntries(CANONICAL_COLUMNS.map((column) => [column, record[column]]))

export const renderJson = (records: readonly CanonicalRecord[]): string =>
  `${JSON.stringify(records.map(toOrderedObject), null, 2)}\n`
