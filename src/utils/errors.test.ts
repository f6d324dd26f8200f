/**
 * Tests for error classification utilities
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  PlannerError,
  NotFoundError,
  ValidationError,
  TemplateRenderError,
  BudgetExceededError,
  ExternalServiceError,
  classifyError,
  createErrorResponse,
  isRetryableError,
  ErrorCode,
  HttpStatus,
} from './errors.js';

describe('errors', () => {
  describe('PlannerError', () => {
    it('should create error with code and message', () => {
      const error = new PlannerError('Test error', ErrorCode.INTERNAL_ERROR);

      expect(error.message).toBe('Test error');
      expect(error.code).toBe(ErrorCode.INTERNAL_ERROR);
      expect(error.name).toBe('PlannerError');
    });

    it('should set default HTTP status based on code', () => {
      expect(new PlannerError('', ErrorCode.VALIDATION_ERROR).httpStatus).toBe(
        HttpStatus.UNPROCESSABLE_ENTITY
      );
      expect(new PlannerError('', ErrorCode.NOT_FOUND).httpStatus).toBe(HttpStatus.NOT_FOUND);
      expect(new PlannerError('', ErrorCode.BUDGET_EXCEEDED).httpStatus).toBe(
        HttpStatus.PAYMENT_REQUIRED
      );
      expect(new PlannerError('', ErrorCode.UNKNOWN_TOOL).httpStatus).toBe(HttpStatus.BAD_REQUEST);
      expect(new PlannerError('', ErrorCode.TEMPLATE_RENDER_ERROR).httpStatus).toBe(
        HttpStatus.INTERNAL_SERVER_ERROR
      );
    });

    it('should allow custom HTTP status', () => {
      const error = new PlannerError('Test', ErrorCode.INTERNAL_ERROR, { httpStatus: 418 });
      expect(error.httpStatus).toBe(418);
    });

    it('should mark service errors retryable', () => {
      expect(new PlannerError('', ErrorCode.SERVICE_UNAVAILABLE).isRetryable).toBe(true);
      expect(new PlannerError('', ErrorCode.EXTERNAL_SERVICE_ERROR).isRetryable).toBe(true);
      expect(new PlannerError('', ErrorCode.VALIDATION_ERROR).isRetryable).toBe(false);
    });

    it('should serialize to JSON', () => {
      const json = new PlannerError('Test error', ErrorCode.NOT_FOUND, {
        details: { resourceId: '123' },
      }).toJSON();

      expect(json).toEqual({
        error: true,
        code: ErrorCode.NOT_FOUND,
        message: 'Test error',
        httpStatus: HttpStatus.NOT_FOUND,
        isRetryable: false,
        details: { resourceId: '123' },
      });
    });
  });

  describe('NotFoundError', () => {
    it('should carry resource info', () => {
      const error = new NotFoundError('Goal', 'goal-123');

      expect(error.message).toBe('Goal not found: goal-123');
      expect(error.code).toBe(ErrorCode.NOT_FOUND);
      expect(error.details).toEqual({ resourceType: 'Goal', resourceId: 'goal-123' });
    });
  });

  describe('ValidationError', () => {
    it('should create from ZodError', () => {
      const schema = z.object({ title: z.string().min(10), priority: z.number().max(5) });
      const parsed = schema.safeParse({ title: 'short', priority: 9 });
      expect(parsed.success).toBe(false);
      if (parsed.success) return;

      const error = ValidationError.fromZodError(parsed.error);
      expect(error.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(error.message).toContain('Validation failed');
      expect(error.details?.errors).toHaveLength(2);
    });
  });

  describe('TemplateRenderError', () => {
    it('should list the missing variables', () => {
      const error = new TemplateRenderError('sop_draft_intro', ['field', 'startupName']);

      expect(error.message).toBe('Template sop_draft_intro is missing variables: field, startupName');
      expect(error.templateId).toBe('sop_draft_intro');
      expect(error.missing).toEqual(['field', 'startupName']);
      expect(error.code).toBe(ErrorCode.TEMPLATE_RENDER_ERROR);
    });
  });

  describe('BudgetExceededError', () => {
    it('should format spend and limit', () => {
      const error = new BudgetExceededError('user-1', 5.2, 5);
      expect(error.message).toBe('LLM budget exhausted for user-1: $5.20 of $5.00');
      expect(error.isRetryable).toBe(false);
    });
  });

  describe('ExternalServiceError', () => {
    it('should be retryable and name the service', () => {
      const error = new ExternalServiceError('search', 'timeout');

      expect(error.code).toBe(ErrorCode.EXTERNAL_SERVICE_ERROR);
      expect(error.isRetryable).toBe(true);
      expect(error.message).toBe('External service error (search): timeout');
      expect(error.details?.serviceName).toBe('search');
    });
  });

  describe('classifyError', () => {
    it('should pass through PlannerError unchanged', () => {
      const original = new PlannerError('Test', ErrorCode.INTERNAL_ERROR);
      expect(classifyError(original)).toBe(original);
    });

    it('should convert ZodError to ValidationError', () => {
      const parsed = z.string().min(5).safeParse('abc');
      if (parsed.success) throw new Error('expected failure');

      const classified = classifyError(parsed.error);
      expect(classified).toBeInstanceOf(ValidationError);
    });

    it('should detect message patterns', () => {
      expect(classifyError(new Error('Goal not found')).code).toBe(ErrorCode.NOT_FOUND);
      expect(classifyError(new Error('title is required')).code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(classifyError(new Error('UNIQUE constraint failed: tasks.key')).code).toBe(
        ErrorCode.CONFLICT
      );
      expect(classifyError(new Error('Something went wrong')).code).toBe(ErrorCode.INTERNAL_ERROR);
    });

    it('should handle non-Error values', () => {
      const classified = classifyError('string error');

      expect(classified.code).toBe(ErrorCode.INTERNAL_ERROR);
      expect(classified.details?.originalError).toBe('string error');
    });
  });

  describe('createErrorResponse', () => {
    it('should attach the request ID', () => {
      const response = createErrorResponse(new NotFoundError('Task', 'task-1'), 'req-123');

      expect(response.error).toBe(true);
      expect(response.code).toBe(ErrorCode.NOT_FOUND);
      expect(response.message).toBe('Task not found: task-1');
      expect(response.requestId).toBe('req-123');
    });

    it('should omit requestId when absent', () => {
      expect(createErrorResponse(new Error('boom'))).not.toHaveProperty('requestId');
    });
  });

  describe('isRetryableError', () => {
    it('should reflect the flag on PlannerError', () => {
      expect(isRetryableError(new ExternalServiceError('llm', 'timeout'))).toBe(true);
      expect(isRetryableError(new ValidationError('bad'))).toBe(false);
    });

    it('should return false for foreign errors', () => {
      expect(isRetryableError(new Error('test'))).toBe(false);
      expect(isRetryableError('string')).toBe(false);
    });
  });
});
