/**
 * 结构化目标描述：字段顺序、线上键名与目标类型
 * EN: Structural target descriptions: field order, wire keys and target kinds
 */

import { Double, Int32, Long, ObjectId } from 'bson';
import { D } from './document';
import { LegacyObjectId, isZeroObjectId } from './objectId';
import { TargetKind } from './coercion';
import { isPlainObject } from './types';

/**
 * 元素规格：目标类型，以及序列元素或嵌套结构
 * EN: Element spec: the target kind, plus sequence elements or a nested struct
 */
export interface ElementSpec {
    kind: TargetKind;
    /** 序列元素规格（仅 Sequence） EN: Sequence element spec (Sequence only) */
    elements?: ElementSpec;
    /** 嵌套结构（仅 Struct） EN: Nested struct (Struct only) */
    schema?: StructSchema;
}

/**
 * 结构化字段规格
 * EN: Structural field spec
 */
export interface FieldSpec extends ElementSpec {
    /** 线上字段名 EN: Wire field name */
    key: string;
    /** 可选字段：undefined 表示缺失 EN: Optional field: undefined means absent */
    optional?: boolean;
    /** 为空时省略 EN: Omit when empty */
    omitEmpty?: boolean;
}

export type StructFields<T> = { [P in keyof T & string]-?: FieldSpec };

/**
 * 结构字段条目（按声明顺序）
 * EN: Struct field entry (in declaration order)
 */
export interface StructField {
    property: string;
    spec: FieldSpec;
}

/**
 * 结构化目标：编码字段顺序与解码目标类型的静态描述
 * EN: Structural target: static description of field order and decode target kinds
 */
export class StructSchema<T extends object = object> {
    readonly name: string;
    readonly fields: readonly StructField[];
    /** 仅用于类型推断 EN: Only used for type inference */
    declare readonly __type?: T;

    constructor(name: string, fields: StructFields<T>) {
        this.name = name;
        const entries: StructField[] = [];
        const keys = new Set<string>();
        for (const [property, spec] of Object.entries<FieldSpec>(fields)) {
            if (keys.has(spec.key)) {
                throw new TypeError(`struct ${name}: duplicate key '${spec.key}'`);
            }
            if (spec.kind === TargetKind.Struct && spec.schema === undefined) {
                throw new TypeError(`struct ${name}: field '${property}' needs a nested schema`);
            }
            keys.add(spec.key);
            entries.push({ property, spec });
        }
        this.fields = entries;
    }
}

/**
 * 声明结构化目标
 * EN: Declare a structural target
 */
export function defineStruct<T extends object>(name: string, fields: StructFields<T>): StructSchema<T> {
    return new StructSchema<T>(name, fields);
}

/**
 * 读取对象属性
 * EN: Read an object property
 */
export function readProperty(target: object, property: string): unknown {
    const value: unknown = Reflect.get(target, property);
    return value;
}

/**
 * 判断值是否为空（用于 omitEmpty）
 * EN: Whether a value is empty (for omitEmpty)
 *
 * 可选字段只有缺失才算空；其他字段比较零值。
 * EN: Optional fields are empty only when absent; other fields compare to the zero value.
 */
export function isEmptyValue(value: unknown, spec: FieldSpec): boolean {
    if (value === undefined || value === null) {
        return true;
    }
    if (spec.optional) {
        return false;
    }
    if (value instanceof LegacyObjectId) return value.isZero();
    if (value instanceof ObjectId) return isZeroObjectId(value);
    if (typeof value === 'string') return value.length === 0;
    if (typeof value === 'number') return value === 0;
    if (typeof value === 'bigint') return value === 0n;
    if (typeof value === 'boolean') return !value;
    if (value instanceof Int32 || value instanceof Double) return value.value === 0;
    if (value instanceof Long) return value.isZero();
    if (value instanceof Date) return value.getTime() === 0;
    if (Array.isArray(value)) return value.length === 0;
    if (value instanceof Map) return value.size === 0;
    if (value instanceof D) return value.length === 0;
    if (value instanceof Uint8Array) return value.length === 0;
    if (isPlainObject(value)) return Object.keys(value).length === 0;
    return false;
}
