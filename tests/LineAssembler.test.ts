import { assembleLogicalLines } from '../src/LineAssembler';

describe('assembleLogicalLines', () => {
  it('passes ordinary lines through', () => {
    const lines = [...assembleLogicalLines(['program p', '  x = 1'])];
    expect(lines).toEqual([
      { leadingWhitespace: '', body: 'program p', isDirective: false, lineNumber: 1, raw: ['program p'] },
      { leadingWhitespace: '  ', body: '  x = 1', isDirective: false, lineNumber: 2, raw: ['  x = 1'] }
    ]);
  });

  it('strips the sentinel from a single directive', () => {
    const lines = [...assembleLogicalLines(['  !$ACC DATA PRESENT(A)'])];
    expect(lines).toEqual([
      {
        leadingWhitespace: '  ',
        body: 'DATA PRESENT(A)',
        isDirective: true,
        lineNumber: 1,
        raw: ['  !$ACC DATA PRESENT(A)']
      }
    ]);
  });

  it('joins a continued directive into one logical line', () => {
    const raw = [
      '    !$ACC DATA PRESENT(A, B) &',
      '    !$ACC COPYIN(C) &',
      '    !$ACC IF(FLAG)'
    ];
    const lines = [...assembleLogicalLines(raw)];
    expect(lines).toHaveLength(1);
    expect(lines[0]).toEqual({
      leadingWhitespace: '    ',
      body: 'DATA PRESENT(A, B) COPYIN(C) IF(FLAG)',
      isDirective: true,
      lineNumber: 1,
      raw
    });
  });

  it('accepts a lower-case sentinel and a marker right after it', () => {
    const lines = [...assembleLogicalLines(['!$acc data present(a) &', '!$acc& copyin(b)'])];
    expect(lines.map(l => l.body)).toEqual(['data present(a) copyin(b)']);
  });

  it('keeps adjacent directives without a marker apart', () => {
    const lines = [...assembleLogicalLines(['!$ACC DATA PRESENT(A)', '!$ACC UPDATE HOST(B)'])];
    expect(lines.map(l => [l.body, l.lineNumber])).toEqual([
      ['DATA PRESENT(A)', 1],
      ['UPDATE HOST(B)', 2]
    ]);
  });

  it('flushes a pending directive when an ordinary line follows', () => {
    const lines = [...assembleLogicalLines(['!$ACC DATA PRESENT(A) &', 'x = 1'])];
    expect(lines.map(l => [l.body, l.isDirective, l.lineNumber])).toEqual([
      ['DATA PRESENT(A)', true, 1],
      ['x = 1', false, 2]
    ]);
  });

  it('emits an unterminated continuation at end of input', () => {
    const lines = [...assembleLogicalLines(['!$ACC UPDATE HOST(A) &'])];
    expect(lines.map(l => l.body)).toEqual(['UPDATE HOST(A)']);
  });

  it('honours a custom sentinel', () => {
    const lines = [...assembleLogicalLines(['!$omp target'], { sentinel: '!$OMP' })];
    expect(lines[0].isDirective).toBe(true);
    expect(lines[0].body).toBe('target');
  });
});
