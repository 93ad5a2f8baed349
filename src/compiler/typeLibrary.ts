import * as fs from "fs";
import builtinTypeLibrary from "../lib/types.json";
import { ArrayTypeSymbol, isArrayType, MethodSymbol, PropertySymbol, TypeSymbol } from "./types";

/**
 * The on-disk shape of a type library. Member types are written as metadata names, with type arguments in
 * angle brackets and `[]` for arrays, e.g. "System.Collections.Generic.IEnumerable`1<T>" or "T[]".
 */
export interface TypeLibraryFile {
    namespaces: string[],
    types: TypeLibraryType[],
}

export interface TypeLibraryType {
    metadataName: string,
    typeParameters?: string[],
    baseTypes?: string[],
    elementType?: string,
    indexerType?: string,
    properties?: TypeLibraryProperty[],
    methods?: TypeLibraryMethod[],
}

export interface TypeLibraryProperty {
    name: string,
    type: string,
    isStatic?: boolean,
}

export interface TypeLibraryMethod {
    name: string,
    parameters: string[],
    returnType: string,
    isStatic?: boolean,
}

function isObject(value: unknown) : value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown) : value is string[] {
    return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isOptional<T>(value: unknown, guard: (value: unknown) => value is T) : boolean {
    return value === undefined || guard(value);
}

function isBoolean(value: unknown) : value is boolean {
    return typeof value === "boolean";
}

function isString(value: unknown) : value is string {
    return typeof value === "string";
}

function isArrayOf<T>(guard: (value: unknown) => value is T) {
    return (value: unknown) : value is T[] => Array.isArray(value) && value.every(guard);
}

function isTypeLibraryProperty(value: unknown) : value is TypeLibraryProperty {
    return isObject(value)
        && isString(value.name)
        && isString(value.type)
        && isOptional(value.isStatic, isBoolean);
}

function isTypeLibraryMethod(value: unknown) : value is TypeLibraryMethod {
    return isObject(value)
        && isString(value.name)
        && isStringArray(value.parameters)
        && isString(value.returnType)
        && isOptional(value.isStatic, isBoolean);
}

function isTypeLibraryType(value: unknown) : value is TypeLibraryType {
    return isObject(value)
        && isString(value.metadataName)
        && isOptional(value.typeParameters, isStringArray)
        && isOptional(value.baseTypes, isStringArray)
        && isOptional(value.elementType, isString)
        && isOptional(value.indexerType, isString)
        && isOptional(value.properties, isArrayOf(isTypeLibraryProperty))
        && isOptional(value.methods, isArrayOf(isTypeLibraryMethod));
}

export function isTypeLibraryFile(value: unknown) : value is TypeLibraryFile {
    return isObject(value)
        && isStringArray(value.namespaces)
        && Array.isArray(value.types)
        && value.types.every(isTypeLibraryType);
}

/**
 * parse a member type as written in a library file, replacing type parameter names with their arguments
 */
export function parseTypeText(text: string, substitutions: ReadonlyMap<string, TypeSymbol> = new Map()) : TypeSymbol {
    let pos = 0;

    function parseOne() : TypeSymbol {
        const start = pos;
        while (pos < text.length && !"<>,[".includes(text[pos])) {
            pos++;
        }
        const name = text.slice(start, pos).trim();
        if (name === "") {
            throw new Error(`Malformed type '${text}' in type library.`);
        }

        const typeArguments : TypeSymbol[] = [];
        if (text[pos] === "<") {
            pos++;
            typeArguments.push(parseOne());
            while (text[pos] === ",") {
                pos++;
                typeArguments.push(parseOne());
            }
            if (text[pos] !== ">") {
                throw new Error(`Malformed type '${text}' in type library.`);
            }
            pos++;
        }

        let result = substitutions.get(name) ?? TypeSymbol(name, typeArguments);
        while (text.startsWith("[]", pos)) {
            pos += 2;
            result = ArrayTypeSymbol(result);
        }
        return result;
    }

    const result = parseOne();
    if (pos !== text.length) {
        throw new Error(`Malformed type '${text}' in type library.`);
    }
    return result;
}

export function TypeLibrary(files: readonly TypeLibraryFile[]) {
    const namespaces = new Set<string>();
    const types = new Map<string, TypeLibraryType>();

    for (const file of files) {
        for (const namespace of file.namespaces) {
            namespaces.add(namespace);
        }
        for (const type of file.types) {
            const existing = types.get(type.metadataName);
            if (!existing) {
                types.set(type.metadataName, type);
                continue;
            }
            // later files extend what earlier files declared
            types.set(type.metadataName, {
                metadataName: type.metadataName,
                typeParameters: existing.typeParameters ?? type.typeParameters,
                baseTypes: [...(existing.baseTypes ?? []), ...(type.baseTypes ?? [])],
                elementType: type.elementType ?? existing.elementType,
                indexerType: type.indexerType ?? existing.indexerType,
                properties: [...(existing.properties ?? []), ...(type.properties ?? [])],
                methods: [...(existing.methods ?? []), ...(type.methods ?? [])],
            });
        }
    }

    function hasNamespace(name: string) : boolean {
        return namespaces.has(name);
    }

    function hasType(metadataName: string) : boolean {
        return types.has(metadataName);
    }

    function substitutionsFor(type: TypeSymbol, definition: TypeLibraryType) : Map<string, TypeSymbol> {
        const result = new Map<string, TypeSymbol>();
        const typeParameters = definition.typeParameters ?? [];
        for (let i = 0; i < typeParameters.length && i < type.typeArguments.length; i++) {
            result.set(typeParameters[i], type.typeArguments[i]);
        }
        return result;
    }

    /**
     * the type itself, then its base types breadth first; arrays are their element's IEnumerable
     */
    function getSelfAndBaseTypes(type: TypeSymbol) : TypeSymbol[] {
        const result : TypeSymbol[] = [];
        const seen = new Set<string>();
        const queue = isArrayType(type)
            ? [TypeSymbol("System.Collections.Generic.IList`1", type.typeArguments)]
            : [type];

        while (queue.length > 0) {
            const current = queue.shift();
            if (!current || seen.has(current.metadataName)) {
                continue;
            }
            seen.add(current.metadataName);
            result.push(current);

            const definition = types.get(current.metadataName);
            if (!definition) {
                continue;
            }
            const substitutions = substitutionsFor(current, definition);
            for (const baseType of definition.baseTypes ?? []) {
                queue.push(parseTypeText(baseType, substitutions));
            }
        }

        if (!seen.has("System.Object")) {
            result.push(TypeSymbol("System.Object"));
        }
        return result;
    }

    /**
     * overloads by arity; the most derived type declaring any match wins
     */
    function lookupMethods(type: TypeSymbol, name: string, argumentCount: number) : MethodSymbol[] {
        for (const current of getSelfAndBaseTypes(type)) {
            const definition = types.get(current.metadataName);
            if (!definition) {
                continue;
            }
            const substitutions = substitutionsFor(current, definition);
            const matches = (definition.methods ?? [])
                .filter((method) => method.name === name && method.parameters.length === argumentCount)
                .map((method) : MethodSymbol => ({
                    name: method.name,
                    containingType: current,
                    parameterTypes: method.parameters.map((p) => parseTypeText(p, substitutions)),
                    returnType: parseTypeText(method.returnType, substitutions),
                    isStatic: method.isStatic ?? false,
                }));
            if (matches.length > 0) {
                return matches;
            }
        }
        return [];
    }

    function lookupProperty(type: TypeSymbol, name: string) : PropertySymbol | null {
        for (const current of getSelfAndBaseTypes(type)) {
            const definition = types.get(current.metadataName);
            const property = definition?.properties?.find((property) => property.name === name);
            if (definition && property) {
                return {
                    name,
                    containingType: current,
                    type: parseTypeText(property.type, substitutionsFor(current, definition)),
                    isStatic: property.isStatic ?? false,
                };
            }
        }
        return null;
    }

    function findMemberType(type: TypeSymbol, select: (definition: TypeLibraryType) => string | undefined) : TypeSymbol | null {
        for (const current of getSelfAndBaseTypes(type)) {
            const definition = types.get(current.metadataName);
            const text = definition ? select(definition) : undefined;
            if (definition && text !== undefined) {
                return parseTypeText(text, substitutionsFor(current, definition));
            }
        }
        return null;
    }

    /**
     * the iteration type of a `foreach` over a value of this type
     */
    function getElementType(type: TypeSymbol) : TypeSymbol | null {
        if (isArrayType(type)) {
            return type.typeArguments[0];
        }
        return findMemberType(type, (definition) => definition.elementType);
    }

    function getIndexerType(type: TypeSymbol) : TypeSymbol | null {
        if (isArrayType(type)) {
            return type.typeArguments[0];
        }
        return findMemberType(type, (definition) => definition.indexerType);
    }

    return {
        hasNamespace,
        hasType,
        lookupMethods,
        lookupProperty,
        getElementType,
        getIndexerType,
    }
}

export type TypeLibrary = ReturnType<typeof TypeLibrary>;

/**
 * the bundled framework library, extended by an optional user library file
 */
export function loadTypeLibrary(extraLibraryAbsPath: string | null = null) : TypeLibrary {
    if (!isTypeLibraryFile(builtinTypeLibrary)) {
        throw new Error("Bundled type library is malformed.");
    }
    const files : TypeLibraryFile[] = [builtinTypeLibrary];

    if (extraLibraryAbsPath) {
        const parsed : unknown = JSON.parse(fs.readFileSync(extraLibraryAbsPath, "utf-8"));
        if (!isTypeLibraryFile(parsed)) {
            throw new Error(`Type library '${extraLibraryAbsPath}' is malformed.`);
        }
        files.push(parsed);
    }

    return TypeLibrary(files);
}
