/**
 * @fileoverview Tests for passthrough argument splitting
 */

import { describe, it, expect } from '@jest/globals';
import { splitArguments } from './process.utils';

describe('splitArguments', () => {
  it('should split on whitespace', () => {
    expect(splitArguments('-r 640x480   --no-banner')).toEqual(['-r', '640x480', '--no-banner']);
  });

  it('should return nothing for blank input', () => {
    expect(splitArguments('')).toEqual([]);
    expect(splitArguments('   ')).toEqual([]);
  });

  it('should keep quoted text together', () => {
    expect(splitArguments('--title "my printer" -vf \'scale=1280:-1\'')).toEqual([
      '--title',
      'my printer',
      '-vf',
      'scale=1280:-1'
    ]);
  });

  it('should keep an empty quoted argument', () => {
    expect(splitArguments('--subtitle ""')).toEqual(['--subtitle', '']);
  });

  it('should join quoted and unquoted parts of one argument', () => {
    expect(splitArguments('--font="DejaVu Sans"')).toEqual(['--font=DejaVu Sans']);
  });
});
