import { AppError, ErrorCode } from '../../src/utils/AppError';
import {
  ConcurrentModificationError,
  EmptyRecordSetError,
  IncompleteReconciliationError,
  MalformedRowError,
  MalformedRowsError,
  ResolutionNoteRequiredError,
} from '../../src/utils/errors';

describe('Reconciliation errors', () => {
  it('should describe a malformed row', () => {
    const error = new MalformedRowError({ rowNumber: 4, field: 'amount', value: 'x', reason: 'Invalid amount: "x"' });

    expect(error).toBeInstanceOf(AppError);
    expect(error.message).toBe('Row 4: Invalid amount: "x"');
    expect(error.statusCode).toBe(422);
    expect(error.code).toBe(ErrorCode.MALFORMED_ROW);
  });

  it('should summarize the first three malformed rows', () => {
    const rows = [1, 2, 3, 4].map((rowNumber) => ({
      rowNumber,
      field: 'date' as const,
      value: '',
      reason: 'Invalid date: ""',
      source: rowNumber % 2 === 0 ? ('BANK' as const) : ('LEDGER' as const),
    }));

    const error = new MalformedRowsError(rows);

    expect(error.message).toBe('4 malformed row(s): ledger row 1 date, bank row 2 date, ledger row 3 date');
    expect(error.rowErrors).toHaveLength(4);
    expect(error.details).toBe(rows);
  });

  it('should list the empty sides', () => {
    expect(new EmptyRecordSetError('s-1', ['ledger', 'bank']).message).toBe(
      'Session s-1 has no ledger or bank records to reconcile'
    );
  });

  it('should expose the uncovered record ids', () => {
    const error = new IncompleteReconciliationError('s-1', ['L1', 'B2']);

    expect(error.uncoveredRecordIds).toEqual(['L1', 'B2']);
    expect(error.statusCode).toBe(409);
  });

  it('should name the exception kind that needs a note', () => {
    expect(new ResolutionNoteRequiredError('e-1', 'AMOUNT_MISMATCH').message).toBe(
      'Exception e-1 of kind AMOUNT_MISMATCH requires a resolution note'
    );
  });

  it('should default the concurrent modification reason', () => {
    const error = new ConcurrentModificationError('s-1');

    expect(error.message).toBe('Session s-1 is being modified by another operation');
    expect(error.code).toBe(ErrorCode.CONCURRENT_MODIFICATION);
  });
});
