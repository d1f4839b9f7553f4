import { DiagnosticSink, formatDiagnostic, countErrors } from '../src/diagnostics';

describe('Diagnostics', () => {
  describe('DiagnosticSink', () => {
    it('should keep diagnostics in report order with their phase', () => {
      const sink = new DiagnosticSink('semantic');
      sink.report('first', 2, 1);
      sink.report('second', 1, 1, 'warning');
      expect(sink.toArray()).toEqual([
        { message: 'first', line: 2, column: 1, severity: 'error', phase: 'semantic' },
        { message: 'second', line: 1, column: 1, severity: 'warning', phase: 'semantic' },
      ]);
    });

    it('should keep repeats unless deduplicating', () => {
      const sink = new DiagnosticSink('semantic');
      sink.report('same', 1, 1);
      sink.report('same', 1, 1);
      expect(sink.size).toBe(2);
    });

    it('should drop a repeated message at the same position when deduplicating', () => {
      const sink = new DiagnosticSink('syntax', true);
      sink.report('same', 1, 1);
      sink.report('same', 1, 1);
      sink.report('same', 1, 2);
      sink.report('other', 1, 1);
      expect(sink.toArray().map(d => `${d.message}@${d.column}`)).toEqual(['same@1', 'same@2', 'other@1']);
    });

    it('should hand out copies', () => {
      const sink = new DiagnosticSink('lexical');
      sink.report('x', 1, 1);
      sink.toArray()[0].message = 'changed';
      expect(sink.toArray()[0].message).toBe('x');
    });
  });

  it('should format a diagnostic on one line', () => {
    expect(formatDiagnostic({ message: 'Race has no result', line: 4, column: 2, severity: 'error', phase: 'semantic' }))
      .toBe('[ERROR] 4:2 - Race has no result');
  });

  it('should count warnings only when asked to', () => {
    const sink = new DiagnosticSink('syntax');
    sink.report('e', 1, 1);
    sink.report('w', 1, 2, 'warning');
    expect(countErrors(sink.toArray())).toBe(1);
    expect(countErrors(sink.toArray(), true)).toBe(2);
  });
});
