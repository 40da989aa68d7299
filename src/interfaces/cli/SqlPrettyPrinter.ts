/**
 * SQL Pretty Printer
 * Layer: Interfaces (CLI)
 *
 * Turns a composed, unexecuted Knex query into readable SQL for the
 * terminal: `toString()` inlines the bindings, `sql-formatter` reindents
 * for the SQLite dialect, and `cli-highlight` adds ANSI colours when
 * enabled. Presentation only; the query itself is never touched or run.
 */
import { highlight } from 'cli-highlight';
import type { Knex } from 'knex';
import { format } from 'sql-formatter';

export interface SqlPrintOptions {
  highlight: boolean;
}

export class SqlPrettyPrinter {
  constructor(private readonly options: SqlPrintOptions) {}

  format(query: Knex.QueryBuilder | string): string {
    const sql = typeof query === 'string' ? query : query.toString();
    const pretty = format(sql, { language: 'sqlite', keywordCase: 'upper' });
    if (!this.options.highlight) return pretty;
    return highlight(pretty, { language: 'sql', ignoreIllegals: true });
  }
}
