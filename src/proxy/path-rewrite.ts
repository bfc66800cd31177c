// =================================================================
// PATH REWRITE
// =================================================================
//
//   /api/users/42?x=1  → /users/42?x=1
//   /api               → /
//   /apiary            → /apiary     (prefix must end on a segment)
//   //users            → /users      (exactly one leading slash)
//
// Pure: same input, same output. The query string is kept as-is.
// =================================================================

export function rewritePath(url: string, prefix: string): string {
    const queryStart = url.indexOf('?');
    const path = queryStart === -1 ? url : url.slice(0, queryStart);
    const query = queryStart === -1 ? '' : url.slice(queryStart);

    const base = prefix.replace(/\/+$/, '');
    let rewritten = path;
    if (base !== '' && (path === base || path.startsWith(`${base}/`))) {
        rewritten = path.slice(base.length);
    }

    return `/${rewritten.replace(/^\/+/, '')}${query}`;
}

/** Join a target's base path with a rewritten request path. */
export function joinPaths(basePath: string, requestPath: string): string {
    const base = basePath.replace(/\/+$/, '');
    return `${base}${requestPath}`;
}
