/**
 * `[symbol_]YYYY-MM-DDThh:mm:ssZ[_principal]`, in UTC. Empty parts are
 * dropped together with their separator.
 */
export function buildTransactionId(
    institutionSymbol: string | undefined,
    principalId: string | undefined,
    at: Date
): string {
    const timestamp = at.toISOString().replace(/\.\d{3}Z$/, 'Z');
    return [institutionSymbol, timestamp, principalId]
        .filter((part): part is string => part !== undefined && part !== '')
        .join('_');
}
