export type ValueType = 'INTEGER' | 'BOOLEAN' | 'NULL';

export type IntegerValue = { readonly kind: 'INTEGER'; readonly value: bigint };
export type BooleanValue = { readonly kind: 'BOOLEAN'; readonly value: boolean };
export type NullValue = { readonly kind: 'NULL' };

export type Value = IntegerValue | BooleanValue | NullValue;

// Shared instances; evaluation hands these out instead of allocating new booleans
export const TRUE: BooleanValue = Object.freeze({ kind: 'BOOLEAN', value: true });
export const FALSE: BooleanValue = Object.freeze({ kind: 'BOOLEAN', value: false });
export const NULL: NullValue = Object.freeze({ kind: 'NULL' });

export function isInteger(v: Value): v is IntegerValue { return v.kind === 'INTEGER'; }
export function isBoolean(v: Value): v is BooleanValue { return v.kind === 'BOOLEAN'; }

export function typeOf(v: Value): ValueType {
    return v.kind;
}

export function inspect(v: Value): string {
    switch (v.kind) {
        case 'INTEGER':
            return v.value.toString();
        case 'BOOLEAN':
            return v.value ? 'true' : 'false';
        case 'NULL':
            return 'null';
    }
}

// Helpers to create values
export function createInteger(value: bigint): IntegerValue {
    return Object.freeze({ kind: 'INTEGER', value });
}

export function nativeBoolToBoolean(value: boolean): BooleanValue {
    return value ? TRUE : FALSE;
}
