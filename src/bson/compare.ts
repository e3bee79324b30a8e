/**
 * 跨类型族的值比较工具
 * EN: Cross-family value comparison utilities
 *
 * 旧版与当前类型族的等价值比较结果为相等：标识符按原始字节、正则按 (pattern, options)、
 * 数值按数值大小（包装类型会被解包）。D 与 Map 按条目顺序比较，M 与普通对象与顺序无关。
 * EN: Equivalent legacy and current values compare equal: identifiers by raw bytes,
 * EN: regexes by (pattern, options), numbers by value (wrappers unwrapped).
 * EN: D and Map compare entries in order; M and plain objects compare regardless of order.
 */

import { sortRegexOptions } from './regex';
import { ClassifiedValue, ValueKind, classifyValue } from './valueKind';

/**
 * BSON 类型比较顺序（MongoDB 规范）
 * EN: BSON type order for comparison (MongoDB spec)
 * https://www.mongodb.com/docs/manual/reference/bson-type-comparison-order/
 */
enum TypeOrder {
    MinKey = 0,
    Null = 1,
    Number = 2,
    String = 3,
    Object = 4,
    Array = 5,
    Binary = 6,
    ObjectId = 7,
    Boolean = 8,
    Date = 9,
    Timestamp = 10,
    Regex = 11,
    Code = 12,
    MaxKey = 13,
    Unsupported = 14,
}

function typeOrderOf(c: ClassifiedValue): TypeOrder {
    switch (c.kind) {
        case ValueKind.MinKey:
            return TypeOrder.MinKey;
        case ValueKind.Null:
        case ValueKind.Undefined:
            return TypeOrder.Null;
        case ValueKind.Number:
        case ValueKind.BigInt:
        case ValueKind.Int32:
        case ValueKind.Long:
        case ValueKind.Double:
        case ValueKind.Decimal128:
            return TypeOrder.Number;
        case ValueKind.String:
            return TypeOrder.String;
        case ValueKind.M:
        case ValueKind.D:
        case ValueKind.Document:
        case ValueKind.OrderedMap:
            return TypeOrder.Object;
        case ValueKind.Sequence:
            return TypeOrder.Array;
        case ValueKind.Binary:
        case ValueKind.Bytes:
            return TypeOrder.Binary;
        case ValueKind.LegacyObjectId:
        case ValueKind.ObjectId:
            return TypeOrder.ObjectId;
        case ValueKind.Boolean:
            return TypeOrder.Boolean;
        case ValueKind.Date:
            return TypeOrder.Date;
        case ValueKind.Timestamp:
            return TypeOrder.Timestamp;
        case ValueKind.RegEx:
        case ValueKind.BSONRegExp:
            return TypeOrder.Regex;
        case ValueKind.Code:
            return TypeOrder.Code;
        case ValueKind.MaxKey:
            return TypeOrder.MaxKey;
        case ValueKind.Unsupported:
            return TypeOrder.Unsupported;
    }
}

/**
 * 比较两个值（可跨类型族）
 * EN: Compare two values (possibly across families)
 * @returns 负数表示 a < b，0 表示相等，正数表示 a > b
 * EN: Returns negative if a < b, 0 if a == b, positive if a > b
 */
export function compareValues(a: unknown, b: unknown): number {
    const ca = classifyValue(a);
    const cb = classifyValue(b);
    const orderA = typeOrderOf(ca);
    const orderB = typeOrderOf(cb);

    // 不同类型：按类型顺序比较
    // EN: Different types: compare by type order
    if (orderA !== orderB) {
        return orderA - orderB;
    }

    switch (orderA) {
        case TypeOrder.MinKey:
        case TypeOrder.Null:
        case TypeOrder.MaxKey:
            return 0;
        case TypeOrder.Number:
            return compareNumbers(numberOf(ca), numberOf(cb));
        case TypeOrder.String:
            return compareStrings(stringOf(ca), stringOf(cb));
        case TypeOrder.Object:
            return compareEntries(entriesOf(ca), entriesOf(cb));
        case TypeOrder.Array: {
            const itemsA = itemsOf(ca);
            const itemsB = itemsOf(cb);
            const minLen = Math.min(itemsA.length, itemsB.length);
            for (let i = 0; i < minLen; i++) {
                const cmp = compareValues(itemsA[i], itemsB[i]);
                if (cmp !== 0) return cmp;
            }
            return itemsA.length - itemsB.length;
        }
        case TypeOrder.Binary: {
            const binA = binaryOf(ca);
            const binB = binaryOf(cb);
            // 先比较长度，再比较子类型，最后逐字节比较
            // EN: Length first, then subtype, then byte by byte
            if (binA.data.length !== binB.data.length) {
                return binA.data.length - binB.data.length;
            }
            if (binA.subtype !== binB.subtype) {
                return binA.subtype - binB.subtype;
            }
            return Buffer.compare(binA.data, binB.data);
        }
        case TypeOrder.ObjectId:
            return Buffer.compare(identifierOf(ca), identifierOf(cb));
        case TypeOrder.Boolean:
            return Number(booleanOf(ca)) - Number(booleanOf(cb));
        case TypeOrder.Date:
            return compareNumbers(dateOf(ca), dateOf(cb));
        case TypeOrder.Timestamp: {
            const tsA = timestampOf(ca);
            const tsB = timestampOf(cb);
            if (tsA.t !== tsB.t) return tsA.t - tsB.t;
            // 比较递增值
            // EN: Compare increment
            return tsA.i - tsB.i;
        }
        case TypeOrder.Regex: {
            const reA = regexOf(ca);
            const reB = regexOf(cb);
            const patternCmp = compareStrings(reA.pattern, reB.pattern);
            if (patternCmp !== 0) return patternCmp;
            return compareStrings(sortRegexOptions(reA.options), sortRegexOptions(reB.options));
        }
        case TypeOrder.Code:
            return compareStrings(codeOf(ca), codeOf(cb));
        case TypeOrder.Unsupported:
            return Object.is(a, b) ? 0 : compareStrings(String(a), String(b));
    }
}

/**
 * 检查两个值是否等价
 * EN: Check whether two values are equivalent
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
    return compareValues(a, b) === 0;
}

/**
 * 按 UTF-16 码元比较字符串
 * EN: Compare strings by UTF-16 code units
 */
function compareStrings(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

/**
 * 比较数值；NaN 小于所有数值，number 与 bigint 精确比较
 * EN: Compare numbers; NaN sorts below every number, number and bigint compare exactly
 */
function compareNumbers(a: number | bigint, b: number | bigint): number {
    if (typeof a === 'number' && Number.isNaN(a)) {
        return typeof b === 'number' && Number.isNaN(b) ? 0 : -1;
    }
    if (typeof b === 'number' && Number.isNaN(b)) {
        return 1;
    }
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

function numberOf(c: ClassifiedValue): number | bigint {
    switch (c.kind) {
        case ValueKind.Number:
        case ValueKind.BigInt:
            return c.value;
        case ValueKind.Int32:
        case ValueKind.Double:
            return c.value.value;
        case ValueKind.Long:
            return c.value.toBigInt();
        case ValueKind.Decimal128:
            return parseFloat(c.value.toString());
        default:
            return NaN;
    }
}

function stringOf(c: ClassifiedValue): string {
    return c.kind === ValueKind.String ? c.value : '';
}

function booleanOf(c: ClassifiedValue): boolean {
    return c.kind === ValueKind.Boolean && c.value;
}

function dateOf(c: ClassifiedValue): number {
    return c.kind === ValueKind.Date ? c.value.getTime() : NaN;
}

function codeOf(c: ClassifiedValue): string {
    return c.kind === ValueKind.Code ? c.value.code : '';
}

function itemsOf(c: ClassifiedValue): readonly unknown[] {
    return c.kind === ValueKind.Sequence ? c.value : [];
}

function timestampOf(c: ClassifiedValue): { t: number; i: number } {
    return c.kind === ValueKind.Timestamp ? { t: c.value.t, i: c.value.i } : { t: 0, i: 0 };
}

/**
 * 标识符的原始字节（旧版空标识符为空缓冲区）
 * EN: Raw identifier bytes (the empty legacy identifier is an empty buffer)
 */
function identifierOf(c: ClassifiedValue): Buffer {
    switch (c.kind) {
        case ValueKind.LegacyObjectId:
            return c.value.bytes();
        case ValueKind.ObjectId:
            return Buffer.from(c.value.id);
        default:
            return Buffer.alloc(0);
    }
}

function regexOf(c: ClassifiedValue): { pattern: string; options: string } {
    switch (c.kind) {
        case ValueKind.RegEx:
        case ValueKind.BSONRegExp:
            return { pattern: c.value.pattern, options: c.value.options };
        default:
            return { pattern: '', options: '' };
    }
}

function binaryOf(c: ClassifiedValue): { subtype: number; data: Buffer } {
    switch (c.kind) {
        case ValueKind.Binary:
            return { subtype: c.value.sub_type, data: Buffer.from(c.value.buffer.subarray(0, c.value.position)) };
        case ValueKind.Bytes:
            return { subtype: 0, data: Buffer.from(c.value) };
        default:
            return { subtype: 0, data: Buffer.alloc(0) };
    }
}

/**
 * 文档的比较条目：D 与 Map 保持顺序（D 保留重复键），M 与普通对象按键排序
 * EN: Comparison entries of a document: D and Map keep their order (D keeps duplicates), M and plain objects sort by key
 */
function entriesOf(c: ClassifiedValue): Array<[string, unknown]> {
    switch (c.kind) {
        case ValueKind.M:
            return sortByKey(Array.from(c.value.entries()));
        case ValueKind.D:
            return c.value.elements.map((e): [string, unknown] => [e.name, e.value]);
        case ValueKind.Document:
            return sortByKey(Object.entries(c.value));
        case ValueKind.OrderedMap:
            return Array.from(c.value, ([key, value]): [string, unknown] => [String(key), value]);
        default:
            return [];
    }
}

function sortByKey(entries: Array<[string, unknown]>): Array<[string, unknown]> {
    return entries.sort((a, b) => compareStrings(a[0], b[0]));
}

/**
 * 按顺序逐键比较文档
 * EN: Compare documents key by key in order
 */
function compareEntries(a: Array<[string, unknown]>, b: Array<[string, unknown]>): number {
    const minLen = Math.min(a.length, b.length);
    for (let i = 0; i < minLen; i++) {
        const keyCmp = compareStrings(a[i][0], b[i][0]);
        if (keyCmp !== 0) return keyCmp;

        const valueCmp = compareValues(a[i][1], b[i][1]);
        if (valueCmp !== 0) return valueCmp;
    }
    return a.length - b.length;
}
