/**
 * Fixed-width integer encodings understood by the field extractor.
 */

export interface DataTypeCodec {
  width: number
  read: (view: DataView, offset: number) => number
}

export const DATA_TYPE_NAMES = [
  'u8',
  'i8',
  'u16le',
  'u16be',
  'i16le',
  'i16be',
  'u32le',
  'u32be',
  'i32le',
  'i32be',
] as const

export type DataType = (typeof DATA_TYPE_NAMES)[number]

const DATA_TYPES: Record<DataType, DataTypeCodec> = {
  u8: { width: 1, read: (view, offset) => view.getUint8(offset) },
  i8: { width: 1, read: (view, offset) => view.getInt8(offset) },
  u16le: { width: 2, read: (view, offset) => view.getUint16(offset, true) },
  u16be: { width: 2, read: (view, offset) => view.getUint16(offset, false) },
  i16le: { width: 2, read: (view, offset) => view.getInt16(offset, true) },
  i16be: { width: 2, read: (view, offset) => view.getInt16(offset, false) },
  u32le: { width: 4, read: (view, offset) => view.getUint32(offset, true) },
  u32be: { width: 4, read: (view, offset) => view.getUint32(offset, false) },
  i32le: { width: 4, read: (view, offset) => view.getInt32(offset, true) },
  i32be: { width: 4, read: (view, offset) => view.getInt32(offset, false) },
}

export function isDataType(name: string): name is DataType {
  return DATA_TYPE_NAMES.some(type => type === name)
}

/**
 * Look up the codec for a data-type tag, undefined for unknown tags
 */
export function getDataTypeCodec(name: string): DataTypeCodec | undefined {
  return isDataType(name) ? DATA_TYPES[name] : undefined
}
