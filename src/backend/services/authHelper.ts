/**
 * Access-control filters for the search index.
 *
 * Documents in the index can carry `oids` (user object ids) and `groups`
 * fields listing who may read them. Given the caller's claims, these helpers
 * produce the OData filter that restricts results to documents the caller
 * can see, optionally combined with a category exclusion.
 */

import { AuthClaims, Overrides } from '../../shared/types';

export interface AuthHelperConfig {
    /** Apply both security filters on every request, regardless of overrides */
    requireAccessControl: boolean;
    /** Whether the index defines the `oids` and `groups` fields */
    hasAuthFields: boolean;
}

export const DEFAULT_AUTH_HELPER_CONFIG: AuthHelperConfig = {
    requireAccessControl: false,
    hasAuthFields: false,
};

export class AuthConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'AuthConfigurationError';
    }
}

/** Escapes a value for use inside an OData string literal */
function escapeODataString(value: string): string {
    return value.replace(/'/g, "''");
}

export class AuthenticationHelper {
    private readonly config: AuthHelperConfig;

    constructor(config: Partial<AuthHelperConfig> = {}) {
        this.config = { ...DEFAULT_AUTH_HELPER_CONFIG, ...config };
    }

    /**
     * Builds the security part of the filter.
     *
     * With both filters active they are OR-ed, so matching either the user
     * or one of their groups is enough.
     *
     * @returns the filter, or null when no security filter applies
     * @throws AuthConfigurationError when a filter is needed but the index has no auth fields
     */
    buildSecurityFilters(overrides: Overrides, authClaims: AuthClaims): string | null {
        const useOidFilter = this.config.requireAccessControl || Boolean(overrides.use_oid_security_filter);
        const useGroupsFilter = this.config.requireAccessControl || Boolean(overrides.use_groups_security_filter);

        if ((useOidFilter || useGroupsFilter) && !this.config.hasAuthFields) {
            throw new AuthConfigurationError(
                'oids and groups must be defined in the search index to use authentication'
            );
        }

        const oidFilter = useOidFilter
            ? `oids/any(g:search.in(g, '${escapeODataString(authClaims.oid ?? '')}'))`
            : null;
        const groupsFilter = useGroupsFilter
            ? `groups/any(g:search.in(g, '${escapeODataString((authClaims.groups ?? []).join(', '))}'))`
            : null;

        if (oidFilter && groupsFilter) {
            return `(${oidFilter} or ${groupsFilter})`;
        }
        return oidFilter ?? groupsFilter;
    }

    /**
     * Full filter expression for a search request: category exclusion and
     * security filter joined with "and".
     */
    buildFilter(overrides: Overrides, authClaims: AuthClaims): string | null {
        const filters: string[] = [];

        if (overrides.exclude_category) {
            filters.push(`category ne '${escapeODataString(overrides.exclude_category)}'`);
        }

        const securityFilter = this.buildSecurityFilters(overrides, authClaims);
        if (securityFilter) {
            filters.push(securityFilter);
        }

        return filters.length === 0 ? null : filters.join(' and ');
    }
}

export function createAuthHelper(config?: Partial<AuthHelperConfig>): AuthenticationHelper {
    return new AuthenticationHelper(config);
}
