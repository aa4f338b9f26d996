import { formatDbError, log, setVerbose } from './logger';

describe('logger', () => {
  afterEach(() => {
    setVerbose(false);
    jest.restoreAllMocks();
  });

  it('keeps only the diagnostic fields of a pg error', () => {
    const err = Object.assign(new Error('relation "invoices" does not exist'), {
      severity: 'ERROR',
      code: '42P01',
      hint: undefined,
    });

    expect(formatDbError(err)).toEqual('message=relation "invoices" does not exist code=42P01 severity=ERROR');
  });

  it('shortens other errors to their first line', () => {
    expect(formatDbError(new Error('no such table: invoices\n    at Database.prepare'))).toEqual(
      'no such table: invoices'
    );
    expect(formatDbError('x'.repeat(250))).toHaveLength(200);
  });

  it('prints debug lines only when verbose', () => {
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => {});

    log.debug('hidden');
    setVerbose(true);
    log.debug('shown');

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug.mock.calls[0][0]).toContain('shown');
  });
});
