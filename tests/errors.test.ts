/**
 * Error Taxonomy Tests
 * Registry, template rendering and error classes
 */

import { describe, expect, it } from 'vitest';
import {
  ConfigError,
  createError,
  ERROR_REGISTRY,
  LexerError,
  LexisError,
  renderErrorMessage,
  renderMessage,
} from '../src/index.js';
import { loc } from './helpers/tokens.js';

describe('Error Taxonomy', () => {
  describe('ERROR_REGISTRY', () => {
    it('uses LEXIS-{L|C}{3-digit} IDs matching their category', () => {
      for (const [id, definition] of ERROR_REGISTRY.entries()) {
        expect(id).toMatch(/^LEXIS-[LC]\d{3}$/);
        expect(definition.errorId).toBe(id);
        const letter = definition.category === 'lexer' ? 'L' : 'C';
        expect(id.charAt(6)).toBe(letter);
        expect(definition.messageTemplate).toBeTruthy();
      }
    });

    it('looks up definitions by ID', () => {
      expect(ERROR_REGISTRY.size).toBe(3);
      expect(ERROR_REGISTRY.has('LEXIS-L001')).toBe(true);
      expect(ERROR_REGISTRY.get('LEXIS-L001')?.category).toBe('lexer');
      expect(ERROR_REGISTRY.get('LEXIS-X999')).toBeUndefined();
    });
  });

  describe('renderMessage', () => {
    it('replaces placeholders', () => {
      expect(renderMessage('Unexpected character {char}', { char: '@' })).toBe(
        'Unexpected character @'
      );
    });

    it('renders missing values as empty', () => {
      expect(renderMessage('Value {x} here', {})).toBe('Value  here');
    });

    it('returns the template unchanged for an unclosed brace', () => {
      expect(renderMessage('Broken {brace', { brace: 1 })).toBe(
        'Broken {brace'
      );
    });

    it('coerces non-string values', () => {
      expect(renderMessage('{n} of {b}', { n: 3, b: false })).toBe(
        '3 of false'
      );
    });

    it('falls back for values without a string conversion', () => {
      expect(renderMessage('{v}', { v: Object.create(null) })).toBe(
        '[object Object]'
      );
    });
  });

  describe('renderErrorMessage', () => {
    it('renders the template registered for an ID', () => {
      expect(renderErrorMessage('LEXIS-C001', { keyword: '1x' })).toBe(
        'Keyword "1x" is not a valid identifier'
      );
    });

    it('throws TypeError for an unknown ID', () => {
      expect(() => renderErrorMessage('LEXIS-X999', {})).toThrow(
        'Unknown error ID: LEXIS-X999'
      );
    });
  });

  describe('LexisError', () => {
    it('appends the location to the message', () => {
      const error = new LexisError({
        errorId: 'LEXIS-L001',
        message: 'Boom',
        location: loc(2, 10, 25),
      });
      expect(error.message).toBe('Boom at 2:10');
      expect(error.name).toBe('LexisError');
    });

    it('toData() strips the location suffix', () => {
      const error = new LexisError({
        errorId: 'LEXIS-L001',
        message: 'Boom',
        location: loc(2, 10, 25),
      });
      expect(error.toData()).toEqual({
        errorId: 'LEXIS-L001',
        message: 'Boom',
        location: loc(2, 10, 25),
        context: undefined,
      });
    });

    it('format() uses a host formatter when given', () => {
      const error = new LexisError({ errorId: 'LEXIS-L001', message: 'Boom' });
      expect(error.format()).toBe('Boom');
      expect(error.format((d) => `[${d.errorId}] ${d.message}`)).toBe(
        '[LEXIS-L001] Boom'
      );
    });

    it('rejects unknown and empty error IDs', () => {
      expect(
        () => new LexisError({ errorId: 'LEXIS-X999', message: 'x' })
      ).toThrow('Unknown error ID: LEXIS-X999');
      expect(() => new LexisError({ errorId: '', message: 'x' })).toThrow(
        'errorId is required'
      );
    });
  });

  describe('LexerError', () => {
    it('requires a lexer error ID', () => {
      const error = new LexerError('LEXIS-L001', 'Bad', loc(1, 5, 4));
      expect(error).toBeInstanceOf(LexisError);
      expect(error.name).toBe('LexerError');
      expect(error.message).toBe('Bad at 1:5');

      expect(() => new LexerError('LEXIS-C001', 'Bad', loc(1, 1, 0))).toThrow(
        'Expected lexer error ID, got: LEXIS-C001'
      );
      expect(() => new LexerError('NOPE', 'Bad', loc(1, 1, 0))).toThrow(
        'Unknown error ID: NOPE'
      );
    });
  });

  describe('ConfigError', () => {
    it('requires a config error ID', () => {
      const error = new ConfigError('LEXIS-C001', 'Bad keyword');
      expect(error.name).toBe('ConfigError');
      expect(error.location).toBeUndefined();
      expect(error.message).toBe('Bad keyword');

      expect(() => new ConfigError('LEXIS-L001', 'Bad')).toThrow(
        'Expected config error ID, got: LEXIS-L001'
      );
    });
  });

  describe('createError', () => {
    it('renders the registry template', () => {
      const error = createError('LEXIS-L001', { char: '@' }, loc(1, 1, 0));
      expect(error).toBeInstanceOf(LexisError);
      expect(error.message).toBe('Unexpected character @ at 1:1');
    });

    it('renders without a location', () => {
      const error = createError('LEXIS-C002', {
        field: 'line',
        expected: 'an integer >= 1',
        value: 0,
      });
      expect(error.message).toBe(
        'Base location line must be an integer >= 1, got 0'
      );
    });

    it('throws TypeError for an unknown ID', () => {
      expect(() => createError('LEXIS-X999', {})).toThrow(TypeError);
    });
  });
});
