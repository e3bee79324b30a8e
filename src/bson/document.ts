/**
 * 旧版文档类型：有序文档 D 与无序文档 M
 * EN: Legacy document types: ordered D and unordered M
 */

/**
 * 有序文档的一个元素
 * EN: One element of an ordered document
 */
export interface DocElem {
    name: string;
    value: unknown;
}

/**
 * 旧版有序文档：按存储顺序编码，允许重复键
 * EN: Legacy ordered document: encoded in stored order, duplicate keys allowed
 */
export class D implements Iterable<DocElem> {
    readonly elements: DocElem[];

    constructor(elements: DocElem[] = []) {
        this.elements = elements;
    }

    /**
     * 从元素或 [name, value] 对创建
     * EN: Create from elements or [name, value] pairs
     */
    static from(entries: Iterable<DocElem | [string, unknown]>): D {
        const doc = new D();
        for (const entry of entries) {
            if (Array.isArray(entry)) {
                doc.push(entry[0], entry[1]);
            } else {
                doc.push(entry.name, entry.value);
            }
        }
        return doc;
    }

    get length(): number {
        return this.elements.length;
    }

    push(name: string, value: unknown): this {
        this.elements.push({ name, value });
        return this;
    }

    /**
     * 获取第一个同名元素的值
     * EN: Get the value of the first element with the name
     */
    get(name: string): unknown {
        return this.elements.find((e) => e.name === name)?.value;
    }

    has(name: string): boolean {
        return this.elements.some((e) => e.name === name);
    }

    /**
     * 转换为无序文档（重复键后者覆盖前者）
     * EN: Convert to an unordered document (later duplicates win)
     */
    toM(): M {
        const m = new M();
        for (const { name, value } of this.elements) {
            m.set(name, value);
        }
        return m;
    }

    [Symbol.iterator](): Iterator<DocElem> {
        return this.elements[Symbol.iterator]();
    }
}

/**
 * 旧版无序文档：键唯一，按插入顺序稳定迭代
 * EN: Legacy unordered document: unique keys, iterated stably in insertion order
 */
export class M extends Map<string, unknown> {
    /**
     * 从普通对象或键值对创建
     * EN: Create from a plain object or key/value pairs
     */
    static from(source: Record<string, unknown> | Iterable<readonly [string, unknown]>): M {
        const m = new M();
        const entries = isIterable(source) ? source : Object.entries(source);
        for (const [key, value] of entries) {
            m.set(key, value);
        }
        return m;
    }

    /**
     * 浅转换为普通对象
     * EN: Shallow conversion to a plain object
     */
    toObject(): Record<string, unknown> {
        return Object.fromEntries(this.entries());
    }
}

function isIterable(value: object): value is Iterable<readonly [string, unknown]> {
    return Symbol.iterator in value;
}
