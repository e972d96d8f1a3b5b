import test from 'node:test';
import assert from 'node:assert/strict';
import { OptionParser } from '../parser.js';
import { formatUsage } from '../usage.js';
import { createOptionRecord, integerOption, switchOption } from '../options/record.js';

test('usage aligns short names and wraps long ones', () => {
  const parser = new OptionParser('Tool description');
  parser.add('one', 'This is the first option', switchOption(null));
  parser.add('two', 'This is the second option', switchOption(null));
  parser.add('twenty_letters_long', 'This is the third option', switchOption(null));

  assert.equal(
    parser.usage(),
    'Tool description\n\n' +
      'OPTIONS:\n\n' +
      '  --one             This is the first option\n' +
      '  --two             This is the second option\n' +
      '  --twenty_letters_long\n' +
      '                    This is the third option\n',
  );
});

test('usage omits the header when there is no description', () => {
  const parser = new OptionParser();
  parser.add('n', 'Count', integerOption(null));

  assert.equal(parser.usage(), 'OPTIONS:\n\n  --n               Count\n');
});

test('a name that exactly reaches the break column wraps', () => {
  // 16 characters + "  --" is 20
  const name = 'sixteen_chars_ab';
  const out = formatUsage('', [createOptionRecord(name, 'Wrapped', switchOption(null))], 20);

  assert.equal(out, `OPTIONS:\n\n  --${name}\n${' '.repeat(20)}Wrapped\n`);
});

test('break column is configurable', () => {
  const parser = new OptionParser('Narrow', { breakColumn: 10 });
  parser.add('ab', 'Short', switchOption(null));
  parser.add('abcdef', 'Long', switchOption(null));

  assert.equal(parser.usage(), 'Narrow\n\nOPTIONS:\n\n  --ab    Short\n  --abcdef\n          Long\n');
});

test('usage with no options still prints the section', () => {
  assert.equal(new OptionParser('Empty').usage(), 'Empty\n\nOPTIONS:\n\n');
});
