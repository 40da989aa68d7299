/**
 * Unit Tests — SqlPrettyPrinter
 *
 * Highlighting is off so the output can be compared line by line.
 */
import { SqlPrettyPrinter } from '@interfaces/cli/SqlPrettyPrinter';

describe('SqlPrettyPrinter', () => {
  const printer = new SqlPrettyPrinter({ highlight: false });

  it('should put each clause on its own line with upper-case keywords', () => {
    expect(printer.format('select id from orders where price = 700').split('\n')).toEqual([
      'SELECT',
      '  id',
      'FROM',
      '  orders',
      'WHERE',
      '  price = 700',
    ]);
  });

  it('should leave no ANSI escapes when highlighting is off', () => {
    expect(printer.format('select 1')).not.toContain('\u001b[');
  });
});
