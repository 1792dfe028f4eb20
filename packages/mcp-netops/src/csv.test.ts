import { describe, it, expect } from 'vitest';
import { parseCsv, sniffDelimiter, splitLine } from './csv.js';

describe('sniffDelimiter', () => {
  it('detects comma, semicolon and tab separated headers', () => {
    expect(sniffDelimiter('host,username,password,secret,device_type')).toBe(',');
    expect(sniffDelimiter('host;username;password;secret;device_type')).toBe(';');
    expect(sniffDelimiter('host\tusername\tpassword')).toBe('\t');
  });
});

describe('splitLine', () => {
  it('keeps delimiters inside quotes and unescapes doubled quotes', () => {
    expect(splitLine('a,"b,c","say ""hi"""', ',')).toEqual(['a', 'b,c', 'say "hi"']);
  });

  it('keeps empty trailing fields', () => {
    expect(splitLine('sw1,admin,pw,,cisco_ios', ',')).toEqual(['sw1', 'admin', 'pw', '', 'cisco_ios']);
  });
});

describe('parseCsv', () => {
  it('stitches the header onto each row', () => {
    const rows = parseCsv('host,username,password,secret,device_type\r\n10.0.0.1,admin,pw,en,cisco_ios\r\n');
    expect(rows).toEqual([
      { host: '10.0.0.1', username: 'admin', password: 'pw', secret: 'en', device_type: 'cisco_ios' },
    ]);
  });

  it('skips blank lines and leaves short rows without the missing keys', () => {
    const rows = parseCsv('host;username;password;secret;device_type\n\nsw2;admin;pw\n');
    expect(rows).toEqual([{ host: 'sw2', username: 'admin', password: 'pw' }]);
  });

  it('returns nothing for an empty file', () => {
    expect(parseCsv('')).toEqual([]);
  });
});
