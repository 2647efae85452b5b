import vm from 'vm';
import { errorMessage } from '../../src/utils/errorMessage';

describe('errorMessage', () => {
  it('should read the message of an Error', () => {
    expect(errorMessage(new Error('catalog down'))).toBe('catalog down');
  });

  it('should read the message of an error from another realm', () => {
    const foreign: unknown = vm.runInNewContext('new Error("from elsewhere")');

    expect(foreign instanceof Error).toBe(false);
    expect(errorMessage(foreign)).toBe('from elsewhere');
  });

  it('should fall back for values without a message', () => {
    expect(errorMessage('oops')).toBe('Unknown error');
    expect(errorMessage({ message: 42 })).toBe('Unknown error');
    expect(errorMessage(undefined)).toBe('Unknown error');
  });

  it('should use a custom fallback', () => {
    expect(errorMessage(null, 'unknown error')).toBe('unknown error');
  });
});
