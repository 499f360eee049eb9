import tableData from '../resources/tables.json';

export interface TableFields {
    essential: readonly string[];
    detail: readonly string[];
}

/**
 * Field projections per table: a short essential set for listings and a
 * detailed set for single-record views.
 */
export class TableCatalog {
    private readonly tables: Map<string, TableFields>;
    private readonly fallback: TableFields;

    constructor(
        tables: Readonly<Record<string, TableFields>> = tableData.tables,
        fallback: TableFields = tableData.fallback
    ) {
        this.tables = new Map(Object.entries(tables));
        this.fallback = fallback;
    }

    public fields(table: string, detailed: boolean = false): readonly string[] {
        const entry = this.tables.get(table) ?? this.fallback;
        return detailed ? entry.detail : entry.essential;
    }

    public isKnown(table: string): boolean {
        return this.tables.has(table);
    }

    public tableNames(): string[] {
        return [...this.tables.keys()];
    }
}
