import {
  classificationKey,
  combine,
  describeClassification,
  isStable,
  isUnstable,
  parameter,
  runtime,
  stable,
  toParameterStability,
  unknown,
  unstable,
} from '../../src/stability/classification';

describe('classification', () => {
  describe('combine', () => {
    it('should drop structural duplicates in first-seen order', () => {
      const combined = combine([parameter('T'), runtime('a.Shape', 'interface'), parameter('T')]);
      expect(combined.members).toEqual([parameter('T'), runtime('a.Shape', 'interface')]);
    });

    it('should flatten nested combined members', () => {
      const inner = combine([unknown('Opaque'), parameter('T')]);
      const combined = combine([inner, parameter('T'), runtime('a.Shape', 'interface')]);
      expect(combined.members).toEqual([unknown('Opaque'), parameter('T'), runtime('a.Shape', 'interface')]);
    });
  });

  describe('predicates', () => {
    it('should treat combined as unstable when any member is unstable', () => {
      const combined = combine([parameter('T'), unstable('mutable collection')]);
      expect(isUnstable(combined)).toBe(true);
      expect(isStable(combined)).toBe(false);
      expect(toParameterStability(combined)).toBe('UNSTABLE');
    });

    it('should treat combined runtime and parameter as neither stable nor unstable', () => {
      const combined = combine([runtime('a.Shape', 'interface'), parameter('T')]);
      expect(isStable(combined)).toBe(false);
      expect(isUnstable(combined)).toBe(false);
      expect(toParameterStability(combined)).toBe('RUNTIME');
    });

    it('should treat an empty combined as stable', () => {
      expect(isStable(combine([]))).toBe(true);
    });

    it('should map single variants to parameter stability', () => {
      expect(toParameterStability(stable('primitive type'))).toBe('STABLE');
      expect(toParameterStability(unstable('1 mutable property'))).toBe('UNSTABLE');
      expect(toParameterStability(runtime('a.Shape', 'interface'))).toBe('RUNTIME');
      expect(toParameterStability(parameter('T'))).toBe('RUNTIME');
      expect(toParameterStability(unknown('Opaque'))).toBe('RUNTIME');
    });
  });

  describe('describeClassification', () => {
    it('should describe every variant', () => {
      expect(describeClassification(stable('enum class'))).toBe('enum class');
      expect(describeClassification(runtime('a.Shape', 'interface; implementation could vary'))).toBe(
        'interface; implementation could vary'
      );
      expect(describeClassification(parameter('T'))).toBe(
        'Type parameter T - stability depends on the type argument'
      );
      expect(describeClassification(unknown('Opaque'))).toBe('Unknown stability: Opaque');
      expect(describeClassification(combine([unknown('Opaque'), parameter('T')]))).toBe(
        'Unknown stability: Opaque; Type parameter T - stability depends on the type argument'
      );
    });
  });

  it('should give distinct keys to distinct variants with the same text', () => {
    expect(classificationKey(parameter('T'))).not.toBe(classificationKey(unknown('T')));
    expect(classificationKey(stable('x'))).not.toBe(classificationKey(unstable('x')));
  });
});
