/**
 * A row of a DataTable: one number per column.
 */
export type Row<C extends string> = { readonly [K in C]: number };

/**
 * Ordered table with a fixed column set. Rows are appended during
 * construction; after `freeze()` the table is read-only.
 */
export class DataTable<C extends string> {
    readonly columns: readonly C[];
    private readonly data: Row<C>[] = [];
    private frozen = false;

    constructor(columns: readonly C[]) {
        if (columns.length === 0) {
            throw new RangeError('A DataTable needs at least one column');
        }
        if (new Set(columns).size !== columns.length) {
            throw new RangeError(`Duplicate column in [${columns.join(', ')}]`);
        }
        this.columns = Object.freeze([...columns]);
    }

    get length(): number {
        return this.data.length;
    }

    get rows(): readonly Row<C>[] {
        return this.data;
    }

    get isFrozen(): boolean {
        return this.frozen;
    }

    append(row: Row<C>): this {
        if (this.frozen) {
            throw new TypeError('Cannot append to a frozen DataTable');
        }
        for (const column of this.columns) {
            if (typeof row[column] !== 'number') {
                throw new TypeError(`Row is missing numeric column "${column}"`);
            }
        }
        if (Object.keys(row).length !== this.columns.length) {
            throw new TypeError(`Row has columns outside [${this.columns.join(', ')}]`);
        }
        this.data.push(Object.freeze({ ...row }));
        return this;
    }

    freeze(): this {
        if (!this.frozen) {
            this.frozen = true;
            Object.freeze(this.data);
        }
        return this;
    }

    column(name: C): number[] {
        return this.data.map((row) => row[name]);
    }

    /**
     * Build and freeze a table from rows in one step.
     */
    static from<C extends string>(columns: readonly C[], rows: Iterable<Row<C>>): DataTable<C> {
        const table = new DataTable(columns);
        for (const row of rows) table.append(row);
        return table.freeze();
    }
}

/**
 * Read-only view of any table, independent of its column names.
 */
export interface TableView {
    readonly columns: readonly string[];
    readonly rows: readonly Readonly<Record<string, number>>[];
}
