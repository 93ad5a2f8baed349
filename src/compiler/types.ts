import type { LocalFunctionStatement, MethodDeclaration, TypeDeclaration } from "./node";

// arrays are not named types; `T[]` is this name with one type argument
export const ArrayMetadataName = "[]";

export const ListMetadataName = "System.Collections.Generic.List`1";

export const predefinedTypeMetadataNames : Readonly<Record<string, string>> = {
    bool: "System.Boolean",
    byte: "System.Byte",
    sbyte: "System.SByte",
    char: "System.Char",
    decimal: "System.Decimal",
    double: "System.Double",
    float: "System.Single",
    int: "System.Int32",
    uint: "System.UInt32",
    long: "System.Int64",
    ulong: "System.UInt64",
    short: "System.Int16",
    ushort: "System.UInt16",
    object: "System.Object",
    string: "System.String",
    void: "System.Void",
};

/**
 * a constructed type, e.g. `List<int>` is {metadataName: "System.Collections.Generic.List`1", typeArguments: [System.Int32]}
 */
export interface TypeSymbol {
    readonly metadataName: string,
    readonly typeArguments: readonly TypeSymbol[],
    // set for types declared in source
    readonly declaration?: TypeDeclaration,
}

export function TypeSymbol(metadataName: string, typeArguments: readonly TypeSymbol[] = [], declaration?: TypeDeclaration) : TypeSymbol {
    return declaration ? {metadataName, typeArguments, declaration} : {metadataName, typeArguments};
}

export function ArrayTypeSymbol(elementType: TypeSymbol) : TypeSymbol {
    return TypeSymbol(ArrayMetadataName, [elementType]);
}

export function isArrayType(type: TypeSymbol) : boolean {
    return type.metadataName === ArrayMetadataName;
}

export interface MethodSymbol {
    readonly name: string,
    readonly containingType: TypeSymbol | null,
    readonly parameterTypes: readonly (TypeSymbol | null)[],
    readonly returnType: TypeSymbol | null,
    readonly isStatic: boolean,
    // set for methods and local functions declared in source
    readonly declaration?: MethodDeclaration | LocalFunctionStatement,
}

export interface PropertySymbol {
    readonly name: string,
    readonly containingType: TypeSymbol,
    readonly type: TypeSymbol | null,
    readonly isStatic: boolean,
}

/**
 * `System.Collections.Generic.List`1<System.Int32>`, `System.Int32[]`
 */
export function typeToString(type: TypeSymbol) : string {
    if (isArrayType(type)) {
        return typeToString(type.typeArguments[0]) + "[]";
    }
    if (type.typeArguments.length === 0) {
        return type.metadataName;
    }
    return type.metadataName + "<" + type.typeArguments.map(typeToString).join(",") + ">";
}
