import {
  createCorrelatedSamples,
  createRandomSamples,
} from '../../src/datasets/samples';
import { config } from '../../src/config';
import { ConfigurationError } from '../../src/architecture/acm/acm.errors';
import { expectCloseToArray } from '../utils/test-helpers';

/** Deterministic rng cycling through `values`. */
function cycle(values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

describe('createRandomSamples', () => {
  describe('Scenario: seeded stream', () => {
    it('draws row by row from seedrandom', () => {
      // Act
      const set = createRandomSamples(1, { seed: 'hello.', count: 2 });
      // Assert
      expect(set.samples).toEqual([[0.9282578795792454], [0.3752569768646784]]);
    });
    it('is reproducible for the same seed', () => {
      // Act
      const a = createRandomSamples(4, { seed: 'rand-x', count: 5 });
      const b = createRandomSamples(4, { seed: 'rand-x', count: 5 });
      // Assert
      expect(a.samples).toEqual(b.samples);
    });
  });

  it('labels dimensions R0 … RN-1', () => {
    // Act
    const set = createRandomSamples(3, { rng: cycle([0.5]), count: 1 });
    // Assert
    expect(set.labels).toEqual(['R0', 'R1', 'R2']);
  });
  it('defaults to 1000 samples', () => {
    // Act
    const set = createRandomSamples(2, { seed: 'count' });
    // Assert
    expect(set.samples).toHaveLength(1000);
  });
  it('prefers an injected rng over a seed', () => {
    // Act
    const set = createRandomSamples(2, { rng: cycle([0.1, 0.2]), seed: 'ignored', count: 1 });
    // Assert
    expect(set.samples).toEqual([[0.1, 0.2]]);
  });
  it.each([0, -3, 1.5])('rejects count %p', (count) => {
    // Act & Assert
    expect(() => createRandomSamples(2, { count })).toThrow(ConfigurationError);
  });
  it('rejects a zero input length', () => {
    // Act & Assert
    expect(() => createRandomSamples(0)).toThrow(ConfigurationError);
  });
});

describe('createCorrelatedSamples', () => {
  describe('Scenario: eight dimensions from a scripted rng', () => {
    const set = createCorrelatedSamples(8, { rng: cycle([0.5, 0.2, 0.4]), count: 2 });

    it('derives the first six components from one draw', () => {
      // Assert
      expectCloseToArray(set.samples[0].slice(0, 6), [0.5, 1, 0.6, 0.25, 0.5, 0.75]);
    });
    it('draws the remaining components from [0.9, 1)', () => {
      // Assert
      expectCloseToArray(set.samples[0].slice(6), [0.92, 0.94]);
    });
    it('consumes one draw per narrow component before the next sample', () => {
      // Assert
      expectCloseToArray(set.samples[1], [0.5, 1, 0.6, 0.25, 0.5, 0.75, 0.92, 0.94]);
    });
    it('uses the descriptive labels', () => {
      // Assert
      expect(set.labels).toEqual(['R1', '2xR1', 'R1+0.1', 'R1^2', '2*R1^2', '3xR1^2', 'R2>0.9', 'R3>0.9']);
    });
  });

  describe('Scenario: more than ten dimensions', () => {
    it('labels the extra dimensions generically', () => {
      // Act
      const set = createCorrelatedSamples(12, { seed: 'wide', count: 1 });
      // Assert
      expect(set.labels.slice(9)).toEqual(['R5>0.9', 'R10', 'R11']);
    });
    it('draws the extra dimensions uniformly after the narrow ones', () => {
      // Act
      const set = createCorrelatedSamples(12, { rng: cycle([0.5, 0, 0, 0, 0, 0.3, 0.7]), count: 1 });
      // Assert
      expectCloseToArray(set.samples[0].slice(6), [0.9, 0.9, 0.9, 0.9, 0.3, 0.7]);
    });
    it('warns once when config.warnings is on', () => {
      // Arrange
      config.warnings = true;
      const warn = jest.spyOn(console, 'warn');
      // Act
      createCorrelatedSamples(11, { seed: 'a', count: 1 });
      createCorrelatedSamples(11, { seed: 'b', count: 1 });
      // Assert
      expect(warn).toHaveBeenCalledTimes(1);
      warn.mockRestore();
    });
  });

  describe('Scenario: seeded stream', () => {
    it('reproduces the first sample of seed acm-0', () => {
      // Act
      const set = createCorrelatedSamples(10, { seed: 'acm-0', count: 1 });
      // Assert
      expectCloseToArray(set.samples[0], [
        0.834627879911614, 1.669255759823228, 0.934627879911614, 0.6966036979257556,
        1.3932073958515112, 2.089811093777267, 0.9808240761111052, 0.9175703966428618,
        0.9680726328952582, 0.9110902938666503,
      ]);
    });
  });

  it('requires at least six dimensions', () => {
    // Act
    const act = () => createCorrelatedSamples(5);
    // Assert
    expect(act).toThrow(
      'For createCorrelatedSamples an input vector size of at least 6 is needed (got 5).'
    );
  });
});
