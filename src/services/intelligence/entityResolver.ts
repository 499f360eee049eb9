import { RecordSource, fieldText } from '../../models/record';
import { logger } from '../../utils/logger';
import { containsQuerySyntax } from '../filterCompiler';

/**
 * Maps a human-readable name (a caller, an assignee) to the identifier the
 * remote service filters on. Resolves to null when the name is unknown.
 */
export interface EntityResolver {
    resolve(name: string, field: string, signal?: AbortSignal): Promise<string | null>;
}

export class StaticEntityResolver implements EntityResolver {
    private readonly entities: Map<string, string>;

    constructor(entities: Readonly<Record<string, string>> = {}) {
        this.entities = new Map(
            Object.entries(entities).map(([name, id]) => [name.trim().toLowerCase(), id])
        );
    }

    public async resolve(name: string): Promise<string | null> {
        return this.entities.get(name.trim().toLowerCase()) ?? null;
    }
}

/**
 * Looks names up in the user table. Ambiguous names and names carrying
 * query operators do not resolve.
 */
export class UserTableResolver implements EntityResolver {
    constructor(
        private readonly source: RecordSource,
        private readonly table: string = 'sys_user'
    ) { }

    public async resolve(name: string, _field: string, signal?: AbortSignal): Promise<string | null> {
        const value = name.trim();
        if (!value || containsQuerySyntax(value)) {
            logger.debug('Refusing user lookup for a name with query operators', {
                operation: 'entityResolver.resolve',
                table: this.table
            });
            return null;
        }
        const result = await this.source.fetchAll({
            table: this.table,
            query: `name=${value}^ORuser_name=${value}`,
            fields: ['sys_id'],
            pageSize: 2,
            maxRecords: 2,
            mode: 'strict',
            displayValue: false,
            signal
        });

        const [first, ...rest] = result.records;
        if (!first || rest.length > 0) {
            logger.debug('User lookup did not resolve to a single record', {
                operation: 'entityResolver.resolve',
                table: this.table,
                matches: result.records.length
            });
            return null;
        }
        return fieldText(first, 'sys_id') || null;
    }
}

/**
 * Tries each resolver in turn; the first non-null answer wins.
 */
export class ChainedEntityResolver implements EntityResolver {
    constructor(private readonly resolvers: readonly EntityResolver[]) { }

    public async resolve(name: string, field: string, signal?: AbortSignal): Promise<string | null> {
        for (const resolver of this.resolvers) {
            const id = await resolver.resolve(name, field, signal);
            if (id) {
                return id;
            }
        }
        return null;
    }
}
