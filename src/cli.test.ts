import { describe, it, expect } from 'vitest';
import { pino } from 'pino';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, USAGE, parseOffset, runCli } from './cli.js';
import { TEST_API_URL, exchangeResponseBody, fixedNow, jsonResponse, stubFetchByDate } from './testing/fixtures.js';

function setup(fetchFn: typeof fetch) {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const run = (argv: string[]) =>
    runCli(argv, {
      logger: pino({ level: 'silent' }),
      apiUrl: TEST_API_URL,
      fetchFn,
      now: fixedNow,
      stdout: text => stdout.push(text),
      stderr: text => stderr.push(text)
    });
  return { run, stdout, stderr };
}

const okFetch = () => stubFetchByDate(date => jsonResponse(exchangeResponseBody(date)));

describe('runCli', () => {
  it('prints the rates of the requested days as JSON', async () => {
    const { run, stdout, stderr } = setup(okFetch());

    const code = await run(['2']);

    expect(code).toBe(EXIT_OK);
    expect(stderr).toEqual([]);
    expect(stdout).toEqual([
      JSON.stringify(
        [
          { '01.01.2024': { USD: { sale: 38.1, purchase: 37.5 }, EUR: { sale: 41.6, purchase: 40.9 } } },
          { '02.01.2024': { USD: { sale: 38.1, purchase: 37.5 }, EUR: { sale: 41.6, purchase: 40.9 } } }
        ],
        null,
        2
      )
    ]);
  });

  it('adds the currencies given with --currency', async () => {
    const { run, stdout } = setup(okFetch());

    const code = await run(['1', '--currency', 'GBP']);

    expect(code).toBe(EXIT_OK);
    expect(JSON.parse(stdout[0])).toEqual([
      {
        '02.01.2024': {
          USD: { sale: 38.1, purchase: 37.5 },
          EUR: { sale: 41.6, purchase: 40.9 },
          GBP: { sale: 48.2, purchase: 47.1 }
        }
      }
    ]);
  });

  it.each([['11'], ['0'], ['abc'], ['-1'], ['1e1'], ['0x2'], [' 3 ']])('rejects offset %s before any request', async offset => {
    const fetchFn = okFetch();
    const { run, stdout, stderr } = setup(fetchFn);

    const code = await run([offset]);

    expect(code).toBe(EXIT_USAGE);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual(['Incorrect offset value. Please choose value from 1 to 10.']);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('reads a negative offset next to options as the offset', async () => {
    const fetchFn = okFetch();
    const { run, stdout, stderr } = setup(fetchFn);

    expect(await run(['--currency', 'GBP', '-5'])).toBe(EXIT_USAGE);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual(['Incorrect offset value. Please choose value from 1 to 10.']);
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('prints usage when the offset is missing', async () => {
    const { run, stdout, stderr } = setup(okFetch());

    expect(await run([])).toBe(EXIT_USAGE);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual([USAGE]);
  });

  it('prints usage for unknown options', async () => {
    const { run, stderr } = setup(okFetch());

    expect(await run(['2', '--bogus'])).toBe(EXIT_USAGE);
    expect(stderr).toHaveLength(1);
    expect(stderr[0].endsWith(USAGE)).toBe(true);
  });

  it('prints help', async () => {
    const { run, stdout } = setup(okFetch());

    expect(await run(['--help'])).toBe(EXIT_OK);
    expect(stdout).toEqual([USAGE]);
  });

  it('prints nothing but the failure when a later day fails', async () => {
    const fetchFn = stubFetchByDate(date =>
      date === '02.01.2024' ? jsonResponse({}, 500) : jsonResponse(exchangeResponseBody(date))
    );
    const { run, stdout, stderr } = setup(fetchFn);

    const code = await run(['2']);

    expect(code).toBe(EXIT_FAILURE);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual([
      `Oops, something went wrong. Error: Request status: 500. Url: ${TEST_API_URL}, params: {"date":"02.01.2024"}.`
    ]);
  });
});

describe('parseOffset', () => {
  it('reads decimal integers, signed or not', () => {
    expect(parseOffset('7')).toBe(7);
    expect(parseOffset('-1')).toBe(-1);
  });

  it.each(['1e1', '0x2', ' 3 ', '2.0', ''])('gives NaN for %j', value => {
    expect(parseOffset(value)).toBeNaN();
  });
});
