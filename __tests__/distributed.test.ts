/**
 * Distributed Sync Tests
 * Learner/actor exchange over the in-memory transport
 */

import { describe, it, expect } from 'vitest';
import { IncompatibleRestoreError, MemoryLogger, ProtocolError } from '../src/core';
import { QLMemory, QLParameter, qlModule, type QLTransition } from '../src/algorithms/ql';
import { createRLRegistry, withHyperparams, type RLConfig } from '../src/rl';
import {
    ActorSync,
    InMemoryTransport,
    LearnerSync,
    SyncMessageTypes,
    decodeSyncMessage,
    encodeSyncMessage,
} from '../src/distributed';
import { flushMicrotasks } from './test-utils';

const config = createRLRegistry().register(qlModule).createConfig('ql');

function transition(reward: number): QLTransition {
    return { state: 's', action: 0, reward, nextState: 't', done: false, nextInvalidActions: [], actionCount: 2 };
}

function actorMemory(cfg: RLConfig = config): QLMemory {
    return new QLMemory(cfg, { originId: 'actor-0', trackOutgoing: true });
}

function parameterWith(values: number[], cfg: RLConfig = config): QLParameter {
    const parameter = new QLParameter(cfg);
    parameter.setQ('s', values);
    return parameter;
}

async function connectedPair() {
    const logger = new MemoryLogger({ task: 'sync', seed: 0 });
    const [actorSide, learnerSide] = InMemoryTransport.createPair({ logger });
    await actorSide.connect();
    await learnerSide.connect();
    const learnerMemory = new QLMemory(config);
    const learner = new LearnerSync(learnerMemory, { logger }).attach(learnerSide);
    const actor = new ActorSync(actorSide, { actorId: 'actor-0', logger });
    return { logger, actorSide, learnerSide, learnerMemory, learner, actor };
}

describe('Learner/actor round trip', () => {
    it('should ship experience to the learner and parameters back', async () => {
        const { learner, learnerMemory, actor } = await connectedPair();
        const memory = actorMemory();
        memory.add(transition(1));
        memory.add(transition(2));

        expect(actor.sendExperience(memory)).toBe(2);
        expect(actor.sendExperience(memory)).toBe(0);
        await flushMicrotasks();
        expect(learner.getStats().accepted).toBe(2);
        expect(learnerMemory.peek().map(t => t.reward)).toEqual([1, 2]);

        expect(learner.publishParameter(parameterWith([1, 2]))).toBe(0);
        await flushMicrotasks();
        expect(actor.hasPendingParameter).toBe(true);
        expect(actor.latestSeq).toBe(0);

        const local = new QLParameter(config);
        expect(actor.applyLatestParameter(local)).toBe(true);
        expect(local.getQ('s', 2)).toEqual([1, 2]);
        expect(actor.applyLatestParameter(local)).toBe(false);
        expect(actor.getStats()).toEqual({
            parametersReceived: 1,
            staleParameters: 0,
            malformed: 0,
            experienceSent: 2,
        });
    });
});

describe('Experience delivery', () => {
    it('should keep batches queued when the send fails and deliver them on retry', async () => {
        const { actorSide, learnerMemory, learner, actor } = await connectedPair();
        const memory = actorMemory();
        memory.add(transition(1));
        memory.add(transition(2));

        actorSide.disconnect();
        expect(() => actor.sendExperience(memory)).toThrow(ProtocolError);
        expect(memory.outgoingCount).toBe(2);
        expect(actor.getStats().experienceSent).toBe(0);

        await actorSide.connect();
        expect(actor.sendExperience(memory)).toBe(2);
        expect(memory.outgoingCount).toBe(0);
        await flushMicrotasks();
        expect(learnerMemory.peek().map(t => t.reward)).toEqual([1, 2]);
        expect(learner.getStats().accepted).toBe(2);
        expect(actor.getStats().experienceSent).toBe(2);
    });

    it('should store samples of a restarted actor and of actors on the default origin', async () => {
        const { learnerMemory, learner, actor } = await connectedPair();
        const first = actorMemory();
        first.add(transition(1));
        first.add(transition(2));
        actor.sendExperience(first);

        const restarted = actorMemory();
        restarted.add(transition(10));
        restarted.add(transition(20));
        actor.sendExperience(restarted);

        const a = new QLMemory(config, { trackOutgoing: true });
        const b = new QLMemory(config, { trackOutgoing: true });
        a.add(transition(100));
        b.add(transition(200));
        actor.sendExperience(a);
        actor.sendExperience(b);
        await flushMicrotasks();

        expect(learnerMemory.peek().map(t => t.reward)).toEqual([1, 2, 10, 20, 100, 200]);
        expect(learner.getStats()).toMatchObject({ accepted: 6, duplicates: 0 });
    });

    it('should not reuse ids after an actor restores an older backup', async () => {
        const { learnerMemory, learner, actor } = await connectedPair();
        const memory = actorMemory();
        memory.add(transition(1));
        actor.sendExperience(memory);
        const checkpoint = memory.backup();

        memory.add(transition(2));
        actor.sendExperience(memory);
        memory.restore(checkpoint);
        memory.add(transition(3));
        expect(actor.sendExperience(memory)).toBe(1);
        await flushMicrotasks();

        expect(learnerMemory.peek().map(t => t.reward)).toEqual([1, 2, 3]);
        expect(learner.getStats().duplicates).toBe(0);
    });
});

describe('ActorSync', () => {
    it('should keep the newest parameter when deliveries are reordered', async () => {
        const { actorSide, actor } = await connectedPair();
        const newer = encodeSyncMessage(SyncMessageTypes.PARAMETER, 'learner', 1, parameterWith([5, 5]).backup());
        const older = encodeSyncMessage(SyncMessageTypes.PARAMETER, 'learner', 0, parameterWith([1, 1]).backup());
        actorSide.simulateReceive(newer);
        actorSide.simulateReceive(older);
        await flushMicrotasks();

        expect(actor.latestSeq).toBe(1);
        expect(actor.getStats().staleParameters).toBe(1);
        const local = new QLParameter(config);
        actor.applyLatestParameter(local);
        expect(local.getQ('s', 2)).toEqual([5, 5]);
    });

    it('should count experience messages as malformed', async () => {
        const { logger, actorSide, actor } = await connectedPair();
        actorSide.simulateReceive(
            encodeSyncMessage(SyncMessageTypes.EXPERIENCE, 'actor-9', 0, actorMemory().takeOutgoing())
        );
        await flushMicrotasks();
        expect(actor.getStats().malformed).toBe(1);
        expect(logger.events.map(e => e.message)).toEqual([
            "Dropped message: Actor does not accept 'experience' messages",
        ]);
    });

    it('should discard a parameter from another configuration', async () => {
        const { logger, actorSide, actor } = await connectedPair();
        const foreign = parameterWith([3, 3], withHyperparams(config, { lr: 0.5 }));
        actorSide.simulateReceive(encodeSyncMessage(SyncMessageTypes.PARAMETER, 'learner', 0, foreign.backup()));
        await flushMicrotasks();

        const local = parameterWith([7, 7]);
        expect(() => actor.applyLatestParameter(local)).toThrow(IncompatibleRestoreError);
        expect(local.getQ('s', 2)).toEqual([7, 7]);
        expect(actor.hasPendingParameter).toBe(false);
        expect(logger.events.map(e => [e.level, e.message])).toEqual([['error', 'Parameter seq 0 rejected']]);
    });
});

describe('LearnerSync', () => {
    it('should merge a redelivered experience blob once', async () => {
        const { logger, learnerSide, learnerMemory, learner } = await connectedPair();
        const memory = actorMemory();
        memory.add(transition(1));
        memory.add(transition(2));
        const message = encodeSyncMessage(SyncMessageTypes.EXPERIENCE, 'actor-0', 0, memory.takeOutgoing());

        learnerSide.simulateReceive(message);
        learnerSide.simulateReceive(message);
        await flushMicrotasks();

        expect(learnerMemory.length).toBe(2);
        expect(learner.getStats()).toEqual({
            accepted: 2,
            duplicates: 2,
            rejected: 0,
            malformed: 0,
            parametersPublished: 0,
        });
        expect(logger.events.map(e => e.message)).toEqual(['Skipped 2 duplicate batches from actor-0']);
    });

    it('should drop and count malformed messages', async () => {
        const { logger, learnerSide, learnerMemory, learner } = await connectedPair();
        learnerSide.simulateReceive('not json');
        learnerSide.simulateReceive(JSON.stringify({ v: 2 }));
        learnerSide.simulateReceive(
            encodeSyncMessage(SyncMessageTypes.PARAMETER, 'learner-2', 0, parameterWith([1, 1]).backup())
        );
        await flushMicrotasks();

        expect(learner.getStats().malformed).toBe(3);
        expect(learnerMemory.length).toBe(0);
        expect(logger.events.filter(e => e.level === 'warn').map(e => e.message)).toEqual([
            'Dropped message: Sync message is not valid JSON',
            'Dropped message: Malformed sync message',
            "Dropped message: Learner does not accept 'parameter' messages",
        ]);
    });

    it('should reject experience recorded under another configuration', async () => {
        const { logger, learnerSide, learnerMemory, learner } = await connectedPair();
        const memory = actorMemory(withHyperparams(config, { gamma: 0.5 }));
        memory.add(transition(1));
        learnerSide.simulateReceive(
            encodeSyncMessage(SyncMessageTypes.EXPERIENCE, 'actor-0', 0, memory.takeOutgoing())
        );
        await flushMicrotasks();

        expect(learner.getStats().rejected).toBe(1);
        expect(learnerMemory.length).toBe(0);
        expect(logger.events[0].message).toMatch(/^Rejected experience: /);
    });

    it('should only publish to attached transports that are connected', async () => {
        const { learnerSide, learner, actor } = await connectedPair();
        learner.detach(learnerSide);
        expect(learner.actorCount).toBe(0);
        expect(learner.publishParameter(parameterWith([1, 1]))).toBe(0);
        expect(learner.publishParameter(parameterWith([2, 2]))).toBe(1);
        await flushMicrotasks();
        expect(actor.latestSeq).toBe(-1);
        expect(learner.getStats().parametersPublished).toBe(2);
    });
});

describe('InMemoryTransport', () => {
    it('should queue messages until the receiver connects', async () => {
        const [a, b] = InMemoryTransport.createPair();
        const received: string[] = [];
        b.onEvent(event => {
            if (event.type === 'message' && event.data !== undefined) received.push(event.data);
        });
        await a.connect();
        a.send('first');
        a.send('second');
        await flushMicrotasks();
        expect(received).toEqual([]);

        await b.connect();
        await flushMicrotasks();
        expect(received).toEqual(['first', 'second']);
    });

    it('should refuse to send while disconnected', () => {
        const [a] = InMemoryTransport.createPair();
        expect(() => a.send('x')).toThrow(ProtocolError);
        expect(a.getState()).toBe('disconnected');
    });

    it('should drop messages that arrive after the receiver left', async () => {
        const [a, b] = InMemoryTransport.createPair();
        await a.connect();
        await b.connect();
        b.disconnect();
        a.send('late');
        await flushMicrotasks();
        expect(b.droppedCount).toBe(1);
    });

    it('should keep delivering when a handler throws', async () => {
        const logger = new MemoryLogger({ task: 'sync', seed: 0 });
        const [a, b] = InMemoryTransport.createPair({ logger, names: ['a', 'b'] });
        const received: string[] = [];
        b.onEvent(() => {
            throw new Error('handler failed');
        });
        b.onEvent(event => {
            if (event.data !== undefined) received.push(event.data);
        });
        await a.connect();
        await b.connect();
        a.send('hello');
        await flushMicrotasks();

        expect(received).toEqual(['hello']);
        expect(logger.events.map(e => [e.source, e.message])).toEqual([
            ['b', "Event handler failed on 'connected'"],
            ['b', "Event handler failed on 'message'"],
        ]);
    });
});

describe('Sync protocol', () => {
    it('should decode what it encodes', () => {
        const blob = parameterWith([1, 2]).backup();
        const message = decodeSyncMessage(encodeSyncMessage(SyncMessageTypes.PARAMETER, 'learner', 4, blob));
        expect(message.type).toBe('parameter');
        expect(message.senderId).toBe('learner');
        expect(message.seq).toBe(4);
        expect(message.blob).toEqual(blob);
    });

    it('should reject blobs that are not base64', () => {
        const raw = JSON.stringify({ v: 1, type: 'parameter', senderId: 'x', seq: 0, timestamp: 0, blob: '@@' });
        expect(() => decodeSyncMessage(raw)).toThrow(ProtocolError);
    });
});
