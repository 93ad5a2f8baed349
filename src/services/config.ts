export interface QueryRefactorConfig {
    queryNamespace: string,
    addMissingUsing: boolean,
    typeLibraryAbsPath: string | null,
    debug: boolean,
}

export function QueryRefactorConfig() : QueryRefactorConfig {
    return {
        queryNamespace: "System.Linq",
        addMissingUsing: true,
        typeLibraryAbsPath: null,
        debug: false,
    }
}

function isRecord(value: unknown) : value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Settings as sent by a client, which may be missing, partial or of the wrong shape; anything unusable falls back to
 * the default.
 */
export function mungeConfig(config: unknown) : QueryRefactorConfig {
    const defaults = QueryRefactorConfig();
    if (!isRecord(config)) {
        return defaults;
    }

    const {queryNamespace, addMissingUsing, typeLibraryAbsPath, debug} = config;
    return {
        queryNamespace: typeof queryNamespace === "string" && /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/.test(queryNamespace)
            ? queryNamespace
            : defaults.queryNamespace,
        addMissingUsing: typeof addMissingUsing === "boolean" ? addMissingUsing : defaults.addMissingUsing,
        typeLibraryAbsPath: typeof typeLibraryAbsPath === "string" && typeLibraryAbsPath !== "" ? typeLibraryAbsPath : null,
        debug: typeof debug === "boolean" ? debug : defaults.debug,
    }
}

export function isSameConfig(l: QueryRefactorConfig, r: QueryRefactorConfig) : boolean {
    return l.queryNamespace === r.queryNamespace
        && l.addMissingUsing === r.addMissingUsing
        && l.typeLibraryAbsPath === r.typeLibraryAbsPath
        && l.debug === r.debug;
}
