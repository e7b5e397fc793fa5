import { errorMessage } from '../utils/errors.js';

describe('errorMessage', () => {
  it('reads the message of an Error', () => {
    expect(errorMessage(new TypeError('bad input'))).toBe('bad input');
  });

  it('reads the message of an error-like object from another realm', () => {
    expect(errorMessage({ code: 'ENOENT', message: "ENOENT: no such file or directory, open 'x'" })).toBe(
      "ENOENT: no such file or directory, open 'x'"
    );
  });

  it('stringifies anything else', () => {
    expect(errorMessage('timeout')).toBe('timeout');
    expect(errorMessage({ message: 42 })).toBe('[object Object]');
  });
});
