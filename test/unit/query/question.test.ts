import { describe, it, expect } from 'vitest';
import { describeQuestion, normalizeQuestion } from '../../../src/query/question.js';
import { ValidationError } from '../../../src/core/errors.js';
import { EdgeType } from '../../../src/storage/types.js';

describe('normalizeQuestion', () => {
  it('should canonicalize the type and ids', () => {
    const question = normalizeQuestion({ type: 'instance of', subject: '  Golden   Retriever ', object: 'DOG' });
    expect(question).toEqual({ type: EdgeType.InstanceOf, subject: 'golden retriever', object: 'dog' });
    expect(Object.isFrozen(question)).toBe(true);
  });

  it.each([
    ['SubclassOf', EdgeType.SubclassOf],
    ['subclass-of', EdgeType.SubclassOf],
    ['HAS_ATTRIBUTE', EdgeType.HasAttribute],
    ['instanceof', EdgeType.InstanceOf],
  ])('should accept the type spelling %s', (type, expected) => {
    expect(normalizeQuestion({ type, subject: 'a', object: 'b' }).type).toBe(expected);
  });

  it('should list every problem in one ValidationError', () => {
    let caught: unknown;
    try {
      normalizeQuestion({ type: 'PartOf', subject: '   ' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    const issues = caught instanceof ValidationError ? caught.issues : [];
    expect(issues).toHaveLength(3);
    expect(issues[0]).toBe('type: unknown question type "PartOf" (expected SubclassOf, InstanceOf or HasAttribute)');
    expect(issues[1]).toBe('subject: must not be blank');
    expect(issues[2]).toMatch(/^object: /);
  });

  it('should reject input that is not an object', () => {
    expect(() => normalizeQuestion('SubclassOf(dog, animal)')).toThrow(ValidationError);
    expect(() => normalizeQuestion(null)).toThrow(ValidationError);
  });
});

describe('describeQuestion', () => {
  it('should render the question in call form', () => {
    expect(describeQuestion(normalizeQuestion({ type: 'SubclassOf', subject: 'Dog', object: 'Animal' })))
      .toBe('SubclassOf(dog, animal)');
  });
});
