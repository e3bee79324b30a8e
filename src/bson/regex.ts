/**
 * 旧版正则表达式值与选项排序
 * EN: Legacy regular expression value and option ordering
 */

import { BSONRegExp } from 'bson';

/**
 * 按 BSON 规范对正则选项排序（字母序）
 * EN: Sort regex options in the BSON canonical (alphabetical) order
 */
export function sortRegexOptions(options: string): string {
    return options.split('').sort().join('');
}

/**
 * 旧版正则表达式值：只承载数据，不校验语法
 * EN: Legacy regular-expression value: carries data only, no syntax validation
 */
export class RegEx {
    readonly pattern: string;
    readonly options: string;

    constructor(pattern: string, options: string = '') {
        this.pattern = pattern;
        this.options = options;
    }

    static fromBSONRegExp(regex: BSONRegExp): RegEx {
        return new RegEx(regex.pattern, regex.options);
    }

    toBSONRegExp(): BSONRegExp {
        return new BSONRegExp(this.pattern, this.options);
    }

    equals(other: RegEx): boolean {
        return this.pattern === other.pattern && this.options === other.options;
    }

    toString(): string {
        return `/${this.pattern}/${this.options}`;
    }
}
