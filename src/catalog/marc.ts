import { MarcDict, MarcFieldDict } from '../types';

const LEADER_LENGTH = 24;
const DIRECTORY_ENTRY_LENGTH = 12;
const FIELD_TERMINATOR = 0x1e;
const SUBFIELD_DELIMITER = 0x1f;

export class MarcParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MarcParseError';
  }
}

export interface MarcSubfield {
  code: string;
  value: string;
}

export interface MarcControlField {
  tag: string;
  value: string;
}

export interface MarcDataField {
  tag: string;
  indicators: [string, string];
  subfields: MarcSubfield[];
}

export type MarcField = MarcControlField | MarcDataField;

export function isControlField(field: MarcField): field is MarcControlField {
  return 'value' in field;
}

export class MarcRecord {
  constructor(
    readonly leader: string,
    readonly fields: readonly MarcField[]
  ) {}

  /** Blank record returned when a catalog lookup yields nothing usable. */
  static empty(): MarcRecord {
    return new MarcRecord(' '.repeat(LEADER_LENGTH), []);
  }

  get isEmpty(): boolean {
    return this.fields.length === 0;
  }

  getFields(tag: string): MarcField[] {
    return this.fields.filter(field => field.tag === tag);
  }

  /** Title proper (245 $a) without its trailing ISBD punctuation. */
  title(): string | undefined {
    for (const field of this.getFields('245')) {
      if (isControlField(field)) continue;
      const subfield = field.subfields.find(sf => sf.code === 'a');
      if (subfield) {
        return subfield.value.replace(/[\s/:;,.=]+$/, '');
      }
    }
    return undefined;
  }

  toDict(): MarcDict {
    return {
      leader: this.leader,
      fields: this.fields.map((field): MarcFieldDict => {
        if (isControlField(field)) {
          return { [field.tag]: field.value };
        }
        return {
          [field.tag]: {
            ind1: field.indicators[0],
            ind2: field.indicators[1],
            subfields: field.subfields.map(sf => ({ [sf.code]: sf.value })),
          },
        };
      }),
    };
  }
}

function readNumber(bytes: Buffer, start: number, end: number): number | undefined {
  const text = bytes.subarray(start, end).toString('latin1');
  return /^\d+$/.test(text) ? Number(text) : undefined;
}

function splitOn(bytes: Buffer, delimiter: number): Buffer[] {
  const parts: Buffer[] = [];
  let start = 0;
  for (let i = 0; i < bytes.length; i++) {
    if (bytes[i] === delimiter) {
      parts.push(bytes.subarray(start, i));
      start = i + 1;
    }
  }
  parts.push(bytes.subarray(start));
  return parts;
}

function withoutTerminator(bytes: Buffer): Buffer {
  return bytes.length > 0 && bytes[bytes.length - 1] === FIELD_TERMINATOR
    ? bytes.subarray(0, bytes.length - 1)
    : bytes;
}

/**
 * Decodes the first ISO 2709 record in `bytes`. Anything after the declared
 * record length is ignored.
 */
export function parseMarc(bytes: Buffer): MarcRecord {
  if (bytes.length < LEADER_LENGTH) {
    throw new MarcParseError(`Record of ${bytes.length} bytes is shorter than a leader`);
  }

  const recordLength = readNumber(bytes, 0, 5);
  if (recordLength === undefined) {
    throw new MarcParseError('Record length is not numeric');
  }
  if (recordLength <= LEADER_LENGTH || recordLength > bytes.length) {
    throw new MarcParseError(
      `Record length ${recordLength} does not fit a body of ${bytes.length} bytes`
    );
  }

  const baseAddress = readNumber(bytes, 12, 17);
  if (baseAddress === undefined || baseAddress <= LEADER_LENGTH || baseAddress > recordLength) {
    throw new MarcParseError('Base address of data is invalid');
  }
  if (bytes[baseAddress - 1] !== FIELD_TERMINATOR) {
    throw new MarcParseError('Directory is not terminated');
  }

  const leader = bytes.subarray(0, LEADER_LENGTH).toString('latin1');
  const encoding: BufferEncoding = leader[9] === 'a' ? 'utf8' : 'latin1';
  const directory = bytes.subarray(LEADER_LENGTH, baseAddress - 1);
  if (directory.length % DIRECTORY_ENTRY_LENGTH !== 0) {
    throw new MarcParseError('Directory length is not a multiple of 12');
  }

  const fields: MarcField[] = [];
  for (let offset = 0; offset < directory.length; offset += DIRECTORY_ENTRY_LENGTH) {
    const tag = directory.subarray(offset, offset + 3).toString('latin1');
    const length = readNumber(directory, offset + 3, offset + 7);
    const start = readNumber(directory, offset + 7, offset + 12);
    if (length === undefined || start === undefined) {
      throw new MarcParseError(`Directory entry for ${tag} is malformed`);
    }

    const fieldStart = baseAddress + start;
    const fieldEnd = fieldStart + length;
    if (fieldEnd > recordLength) {
      throw new MarcParseError(`Field ${tag} runs past the end of the record`);
    }
    const data = withoutTerminator(bytes.subarray(fieldStart, fieldEnd));

    if (/^00\d$/.test(tag)) {
      fields.push({ tag, value: data.toString(encoding) });
      continue;
    }

    const ind1 = data.length > 0 ? String.fromCharCode(data[0]) : ' ';
    const ind2 = data.length > 1 ? String.fromCharCode(data[1]) : ' ';
    const subfields = splitOn(data.subarray(2), SUBFIELD_DELIMITER)
      .slice(1)
      .filter(chunk => chunk.length > 0)
      .map(chunk => ({
        code: String.fromCharCode(chunk[0]),
        value: chunk.subarray(1).toString(encoding),
      }));
    fields.push({ tag, indicators: [ind1, ind2], subfields });
  }

  return new MarcRecord(leader, fields);
}
