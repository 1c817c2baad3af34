import { BaseAnalyzer, Extraction, formatBytes, normalizeCommand } from './BaseAnalyzer';
import { ParseError } from '../errors';

export interface ObjectField {
  name: string;
  type: string;
  offset: number;
  value: string;
  isStatic: boolean;
  isNull: boolean;
}

export interface DumpObjData {
  address: string | null;
  valid: boolean;
  typeName: string | null;
  methodTable: string | null;
  eeClass: string | null;
  size: number | null;
  generation: number | null;
  stringValue: string | null;
  array: { rank: number; length: number } | null;
  fields: ObjectField[];
  category: string | null;
  warnings: string[];
}

const CATEGORIES: Array<[string, string]> = [
  ['Exception', 'exception object'],
  ['SqlConnection', 'database connection'],
  ['SqlCommand', 'database command'],
  ['DbContext', 'Entity Framework context'],
  ['HttpClient', 'HTTP client'],
  ['FileStream', 'file handle'],
  ['Timer', 'timer'],
  ['Task', 'async task'],
  ['Thread', 'thread object']
];

// MT  Field  Offset  Type  VT  Attr  Value  Name
const FIELD_ROW = /^\s*([0-9a-fA-F]{8,16})\s+([0-9a-fA-F]+)\s+([0-9a-fA-F]+)\s+(\S+)\s+([01])\s+(instance|static|shared|TLstatic|CLstatic)\s+(\S+)\s+(\S+)\s*$/;
const INVALID = /Invalid object|invalid CLASS field|is not a valid object/i;
const LARGE_OBJECT = 10 * 1024;
const CRITICAL_FIELDS = ['_connectionstring', '_state', '_disposed'];

function match(pattern: RegExp, output: string): string | null {
  const m = pattern.exec(output);
  return m ? m[1].trim() : null;
}

export class DumpObjAnalyzer extends BaseAnalyzer<DumpObjData> {
  readonly name = 'dumpobj';
  readonly description = 'Type, size and field values of one object from !do';
  readonly tier = 1;

  canAnalyze(command: string): boolean {
    const cmd = normalizeCommand(command);
    return cmd === '!do' || cmd.startsWith('!do ') || cmd.startsWith('!dumpobj');
  }

  protected extract(command: string, output: string): Extraction<DumpObjData> {
    const address = command.trim().split(/\s+/).filter(p => !p.startsWith('-'))[1] ?? null;
    const typeName = match(/^\s*Name:\s+(.+)$/m, output);
    const methodTable = match(/MethodTable:\s+([0-9a-fA-F]+)/, output);

    if (INVALID.test(output) && typeName === null) {
      return {
        data: {
          address,
          valid: false,
          typeName: null,
          methodTable: null,
          eeClass: null,
          size: null,
          generation: null,
          stringValue: null,
          array: null,
          fields: [],
          category: null,
          warnings: []
        },
        summary: `Object ${address ?? '(no address)'} is not a valid managed object.`,
        findings: ['Address may be freed, corrupted, or not an object (a method table address, for example)']
      };
    }
    if (typeName === null && methodTable === null) {
      throw new ParseError('no Name or MethodTable line found');
    }

    const sizeText = match(/Size:\s+(\d+)\(0x[0-9a-fA-F]+\)\s*bytes/, output);
    const size = sizeText !== null ? parseInt(sizeText, 10) : null;
    const genText = match(/GC Generation:\s+(\d+)/, output);
    const generation = genText !== null ? parseInt(genText, 10) : null;
    const stringValue = match(/^\s*String:\s+(.*)$/m, output);
    const arrayMatch = /Array:\s+Rank\s+(\d+),\s+Number of elements\s+(\d+)/.exec(output);
    const array = arrayMatch ? { rank: parseInt(arrayMatch[1], 10), length: parseInt(arrayMatch[2], 10) } : null;

    const fields: ObjectField[] = [];
    for (const line of output.split(/\r?\n/)) {
      const f = FIELD_ROW.exec(line);
      if (!f) continue;
      fields.push({
        name: f[8],
        type: f[4],
        offset: parseInt(f[3], 16),
        value: f[7],
        isStatic: f[6] !== 'instance',
        isNull: f[5] === '0' && /^0+$/.test(f[7])
      });
    }

    const category = typeName
      ? CATEGORIES.find(([keyword]) => typeName.toLowerCase().includes(keyword.toLowerCase()))?.[1] ?? null
      : null;

    const nulls = fields.filter(f => f.isNull);
    const warnings: string[] = [];
    if (fields.length > 2 && nulls.length > fields.length / 2) {
      warnings.push(`${nulls.length}/${fields.length} fields are null - possible initialization issue`);
    }
    if (size !== null && size > LARGE_OBJECT) {
      warnings.push(`Large object (${formatBytes(size)})`);
    }
    for (const f of nulls) {
      if (CRITICAL_FIELDS.includes(f.name.toLowerCase())) warnings.push(`Field ${f.name} is null`);
    }

    const type = typeName ?? `MT ${methodTable}`;
    const findings = [`Object type: ${type}`];
    if (size !== null) findings.push(`Size: ${formatBytes(size)}`);
    if (fields.length > 0) {
      findings.push(`Fields: ${fields.length} total, ${nulls.length} null, ${fields.filter(f => f.isStatic).length} static`);
    }
    if (stringValue !== null) {
      findings.push(`String value: "${stringValue.length > 50 ? `${stringValue.slice(0, 50)}...` : stringValue}"`);
    }
    if (array) findings.push(`Array: ${array.length} elements, rank ${array.rank}`);
    findings.push(...warnings);
    if (generation !== null) {
      findings.push(`GC generation ${generation}${generation === 2 ? ' (long-lived object)' : ''}`);
    }

    return {
      data: {
        address,
        valid: true,
        typeName,
        methodTable,
        eeClass: match(/EEClass:\s+([0-9a-fA-F]+)/, output),
        size,
        generation,
        stringValue,
        array,
        fields,
        category,
        warnings
      },
      summary: `${type}${category ? ` (${category})` : ''} at ${address ?? '(no address)'}: ${size ?? 0} bytes, ${fields.length} fields.`,
      findings
    };
  }
}
