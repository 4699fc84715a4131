import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { canTransition, deriveState, settle } from './transitions.js';
import { Conversation, ConversationState } from '../types/contracts.js';
import { InvalidStateError } from './errors.js';

function conv(over: Partial<Conversation> = {}): Conversation {
  return {
    id: 'c-1',
    channel: 'web',
    messages: [],
    state: 'idle',
    activeTurns: [],
    pendingCaseIds: [],
    supervisorOverride: false,
    version: 0,
    createdAt: '2024-01-01T00:00:00.000Z',
    lastActivityAt: '2024-01-01T00:00:00.000Z',
    ...over
  };
}

describe('canTransition', () => {
  const allStates: ConversationState[] = ['idle', 'processing', 'awaiting_supervision'];

  const allowedTransitions: Record<ConversationState, ConversationState[]> = {
    idle: ['processing'],
    processing: ['idle', 'awaiting_supervision'],
    awaiting_supervision: ['processing', 'idle']
  };

  it('should allow valid transitions', () => {
    for (const from of allStates) {
      for (const to of allowedTransitions[from]) {
        assert.equal(canTransition(from, to), true, `Transition from ${from} to ${to} should be allowed`);
      }
    }
  });

  it('should disallow invalid transitions', () => {
    for (const from of allStates) {
      for (const to of allStates) {
        if (!allowedTransitions[from].includes(to)) {
          assert.equal(canTransition(from, to), false, `Transition from ${from} to ${to} should be disallowed`);
        }
      }
    }
  });
});

describe('deriveState', () => {
  it('is processing while any turn runs, even with open cases', () => {
    assert.equal(deriveState({ activeTurns: [1], pendingCaseIds: ['k1'] }), 'processing');
  });

  it('is awaiting_supervision when only cases are open', () => {
    assert.equal(deriveState({ activeTurns: [], pendingCaseIds: ['k1'] }), 'awaiting_supervision');
  });

  it('is idle otherwise', () => {
    assert.equal(deriveState({ activeTurns: [], pendingCaseIds: [] }), 'idle');
  });
});

describe('settle', () => {
  it('returns the same object when the state is unchanged', () => {
    const c = conv();
    assert.equal(settle(c), c);
  });

  it('moves idle to processing when a turn starts', () => {
    assert.equal(settle(conv({ activeTurns: [1] })).state, 'processing');
  });

  it('rejects idle straight to awaiting_supervision', () => {
    assert.throws(() => settle(conv({ pendingCaseIds: ['k1'] })), InvalidStateError);
  });
});
