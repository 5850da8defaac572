/**
 * Q-Learning Tests
 * Table updates, trainer data requirements and the epsilon-greedy worker
 */

import { describe, it, expect } from 'vitest';
import { IncompatibleRestoreError, InsufficientDataError, createRng } from '../src/core';
import {
    QLMemory,
    QLParameter,
    QLTrainer,
    QLWorkerHooks,
    observationKey,
    qlModule,
    type QLTransition,
} from '../src/algorithms/ql';
import { createRLRegistry, withHyperparams, type RLWorkerContext } from '../src/rl';

const registry = createRLRegistry().register(qlModule);

function transition(overrides: Partial<QLTransition>): QLTransition {
    return {
        state: 's0',
        action: 0,
        reward: 0,
        nextState: 's1',
        done: false,
        nextInvalidActions: [],
        actionCount: 2,
        ...overrides,
    };
}

function context(overrides: Partial<RLWorkerContext> = {}): RLWorkerContext {
    return {
        training: false,
        playerIndex: 0,
        stepNum: 0,
        rng: createRng(0),
        actionCount: 3,
        invalidActions: [],
        reward: 0,
        done: false,
        ...overrides,
    };
}

describe('QLParameter', () => {
    const config = registry.createConfig('ql');

    it('should pad unvisited actions with initialQ', () => {
        const parameter = new QLParameter(config);
        parameter.setQ('p', [1]);
        expect(parameter.getQ('p', 3)).toEqual([1, 0, 0]);
        expect(parameter.getQ('unseen', 2)).toEqual([0, 0]);
        expect(parameter.maxQ('p', 3, [0, 2])).toBe(1);
        expect(parameter.maxQ('p', 3, [])).toBe(0);
        expect(parameter.size).toBe(1);
    });

    it('should restore a backup into a fresh table', () => {
        const parameter = new QLParameter(config);
        parameter.setQ('s0', [0, 0.1]);
        parameter.setQ('s1', [0.2, 0]);
        const blob = parameter.backup();

        const copy = new QLParameter(config);
        copy.restore(blob);
        expect(copy.getQ('s0', 2)).toEqual([0, 0.1]);
        expect(copy.summary()).toBe('ql parameter: 2 states');
        expect(copy.backup()).toEqual(blob);
    });

    it('should keep its table when the backup came from another configuration', () => {
        const blob = new QLParameter(config).backup();
        const other = new QLParameter(withHyperparams(config, { lr: 0.5 }));
        other.setQ('x', [5]);
        expect(() => other.restore(blob)).toThrow(IncompatibleRestoreError);
        expect(other.getQ('x', 1)).toEqual([5]);
    });
});

describe('QLTrainer', () => {
    function setup() {
        const config = registry.createConfig('ql', { hyperparams: { batchSize: 2 } });
        const parameter = new QLParameter(config);
        const memory = new QLMemory(config);
        return { parameter, memory, trainer: new QLTrainer(config, parameter, memory) };
    }

    it('should refuse to train below batchSize', () => {
        const { memory, trainer } = setup();
        memory.add(transition({ action: 1, reward: 1, done: true }));
        expect(trainer.requiredSamples()).toBe(2);
        expect(() => trainer.train()).toThrow(InsufficientDataError);

        const outcome = trainer.tryTrain();
        expect(outcome.trained).toBe(false);
        if (!outcome.trained) {
            expect(outcome.error.available).toBe(1);
            expect(outcome.error.required).toBe(2);
        }
        expect(trainer.getTrainCount()).toBe(0);
    });

    it('should apply the one-step update with masked bootstrap', () => {
        const { parameter, memory, trainer } = setup();
        memory.add(transition({ state: 's0', action: 1, reward: 1, done: true }));
        memory.add(transition({ state: 's1', action: 0, nextState: 's0', nextInvalidActions: [0] }));

        const info = trainer.train();
        expect(parameter.getQ('s0', 2)).toEqual([0, 0.1]);
        const q = parameter.getQ('s1', 2);
        expect(q[0]).toBeCloseTo(0.009, 12);
        expect(q[1]).toBe(0);
        expect(info.tdError).toBeCloseTo(0.545, 12);
        expect(info.states).toBe(2);
        expect(memory.length).toBe(0);
        expect(trainer.getTrainCount()).toBe(1);
        expect(trainer.lastInfo).toEqual(info);
    });

    it('should never lower the train count', () => {
        const { memory, trainer } = setup();
        const counts: number[] = [];
        for (let i = 0; i < 5; i++) {
            memory.add(transition({ reward: i }));
            trainer.tryTrain();
            counts.push(trainer.getTrainCount());
        }
        expect(counts).toEqual([0, 1, 1, 2, 2]);
    });
});

describe('QLWorkerHooks', () => {
    it('should act greedily when evaluating', () => {
        const config = registry.createConfig('ql');
        const parameter = new QLParameter(config);
        parameter.setQ('0', [0, 0.5, 0.2]);
        parameter.setQ('1', [0.3, 0.3, 0]);
        const hooks = new QLWorkerHooks(config, parameter, null, 3);

        expect(hooks.policy([0], context())).toBe(1);
        expect(hooks.policy([0], context({ invalidActions: [1] }))).toBe(2);
        expect(hooks.policy([1], context())).toBe(0);
        expect(hooks.renderTerminal([0])).toBe('0: 0.000\n1: 0.500\n2: 0.200');
    });

    it('should explore only among valid actions', () => {
        const config = registry.createConfig('ql', { hyperparams: { epsilon: 1 } });
        const hooks = new QLWorkerHooks(config, new QLParameter(config), null, 3);
        const ctx = context({ training: true, invalidActions: [0, 1], rng: createRng(4) });
        for (let i = 0; i < 5; i++) {
            expect(hooks.policy([0], ctx)).toBe(2);
        }
    });

    it('should record transitions only while training', () => {
        const config = registry.createConfig('ql', { hyperparams: { epsilon: 0 } });
        const parameter = new QLParameter(config);
        parameter.setQ('0', [0, 1, 0]);
        const memory = new QLMemory(config);
        const hooks = new QLWorkerHooks(config, parameter, memory, 3);

        hooks.onReset([0]);
        hooks.onStep([0], context({ training: true }));
        expect(memory.length).toBe(0);

        hooks.policy([0], context({ training: true }));
        hooks.onStep([4], context({ training: true, reward: 1, invalidActions: [2] }));
        expect(memory.peek()).toEqual([
            {
                state: '0',
                action: 1,
                reward: 1,
                nextState: '4',
                done: false,
                nextInvalidActions: [2],
                actionCount: 3,
            },
        ]);

        hooks.policy([4], context());
        hooks.onStep([5], context({ reward: 1 }));
        expect(memory.length).toBe(1);
    });

    it('should key observations by their flattened values', () => {
        expect(observationKey([1, 0, 2])).toBe('1,0,2');
        expect(observationKey(3)).toBe('3');
    });
});

describe('qlModule', () => {
    it('should size its memory from the hyperparameters', () => {
        const config = registry.createConfig('ql', { hyperparams: { memoryCapacity: 2 } });
        const memory = registry.makeRemoteMemory(config);
        expect(memory).toBeInstanceOf(QLMemory);
        expect(memory.capacity).toBe(2);
        expect(registry.makeRemoteMemory(config, { capacity: 7 }).capacity).toBe(7);
    });

    it('should build a trainer from registry components', () => {
        const config = registry.createConfig('ql');
        const parameter = registry.makeParameter(config);
        const trainer = registry.makeTrainer(config, parameter, registry.makeRemoteMemory(config));
        expect(trainer).toBeInstanceOf(QLTrainer);
        expect(trainer.requiredSamples()).toBe(4);
    });
});
