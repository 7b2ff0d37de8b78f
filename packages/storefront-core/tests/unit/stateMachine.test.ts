/**
 * Unit Tests for Order State Machine
 */

import {
  ALLOWED_TRANSITIONS,
  ORDER_STATUSES,
  TERMINAL_STATUSES,
  getTransitionEventType,
  isDecidedStatus,
  isOrderStatus,
  isTerminalStatus,
  validateTransition,
} from 'storefront-core';
import { isReachable } from '../helpers';

describe('Order State Machine', () => {
  describe('validateTransition', () => {
    it('should let the system issue the payment code', () => {
      expect(validateTransition('created', 'awaiting_evidence', 'system')).toEqual({ valid: true });
    });

    it('should let the buyer submit evidence', () => {
      expect(validateTransition('awaiting_evidence', 'under_review', 'buyer')).toEqual({ valid: true });
    });

    it('should let the system cancel an order without evidence', () => {
      expect(validateTransition('awaiting_evidence', 'cancelled', 'system')).toEqual({ valid: true });
    });

    it('should let only owners decide', () => {
      expect(validateTransition('under_review', 'approved', 'owner').valid).toBe(true);
      expect(validateTransition('under_review', 'rejected', 'owner').valid).toBe(true);

      const result = validateTransition('under_review', 'approved', 'buyer');
      expect(result.valid).toBe(false);
      expect(result.error).toBe(
        "Actor type 'buyer' is not allowed to transition from 'under_review' to 'approved'"
      );
    });

    it('should let the system or an owner fulfill an approved order', () => {
      expect(validateTransition('approved', 'fulfilled', 'system').valid).toBe(true);
      expect(validateTransition('approved', 'fulfilled', 'owner').valid).toBe(true);
      expect(validateTransition('approved', 'fulfilled', 'buyer').valid).toBe(false);
    });

    it('should NOT allow skipping review', () => {
      const result = validateTransition('awaiting_evidence', 'approved', 'owner');
      expect(result.valid).toBe(false);
      expect(result.error).toBe(
        "Transition from 'awaiting_evidence' to 'approved' is not allowed. Allowed targets: under_review, cancelled"
      );
    });

    it('should NOT allow cancelling an order under review', () => {
      expect(validateTransition('under_review', 'cancelled', 'system').valid).toBe(false);
    });

    it('should NOT allow a transition to the same status', () => {
      expect(validateTransition('approved', 'approved', 'owner')).toEqual({
        valid: false,
        error: "Order is already in 'approved' status",
      });
    });

    it('should NOT allow leaving a terminal status', () => {
      for (const status of TERMINAL_STATUSES) {
        const result = validateTransition(status, 'approved', 'owner');
        expect(result.valid).toBe(false);
        expect(result.error).toBe(`Cannot transition from terminal status '${status}'`);
      }
    });
  });

  describe('status helpers', () => {
    it('should mark fulfilled, rejected and cancelled as terminal', () => {
      expect(ORDER_STATUSES.filter(isTerminalStatus)).toEqual(['rejected', 'fulfilled', 'cancelled']);
    });

    it('should treat approved, rejected and fulfilled as decided', () => {
      expect(ORDER_STATUSES.filter(isDecidedStatus)).toEqual(['approved', 'rejected', 'fulfilled']);
    });

    it('should recognise order statuses', () => {
      expect(isOrderStatus('under_review')).toBe(true);
      expect(isOrderStatus('pending')).toBe(false);
    });

    it('should give terminal statuses no outgoing edges', () => {
      for (const status of TERMINAL_STATUSES) {
        expect(ALLOWED_TRANSITIONS[status]).toEqual([]);
      }
    });
  });

  describe('getTransitionEventType', () => {
    it('should name each edge', () => {
      expect(getTransitionEventType('created', 'awaiting_evidence')).toBe('payment_code_issued');
      expect(getTransitionEventType('awaiting_evidence', 'under_review')).toBe('evidence_submitted');
      expect(getTransitionEventType('under_review', 'approved')).toBe('order_approved');
      expect(getTransitionEventType('under_review', 'rejected')).toBe('order_rejected');
      expect(getTransitionEventType('approved', 'fulfilled')).toBe('order_fulfilled');
      expect(getTransitionEventType('awaiting_evidence', 'cancelled')).toBe('evidence_timeout');
    });
  });

  describe('isReachable', () => {
    it('should follow edges forward only', () => {
      expect(isReachable('created', 'fulfilled')).toBe(true);
      expect(isReachable('created', 'cancelled')).toBe(true);
      expect(isReachable('under_review', 'cancelled')).toBe(false);
      expect(isReachable('fulfilled', 'approved')).toBe(false);
      expect(isReachable('rejected', 'rejected')).toBe(true);
    });
  });
});
