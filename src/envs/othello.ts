/**
 * @module envs/othello
 * @description Two-player Othello on a W x H board
 *
 * Player 0 plays `o` (cell value 1) and moves first, player 1 plays `x`
 * (cell value -1). A move is valid when it flips at least one stone. A
 * player without a valid move passes; the game ends when neither player
 * can move, with +1/-1 to the player holding more stones.
 */

import { z } from 'zod';
import { TypeIncompatibilityError, ValidationError } from '../core/errors';
import type { JsonValue, SeededRandom } from '../core/repro';
import { box, discrete, type BoxSpace, type DiscreteSpace } from '../core/space';
import { parseWithSchema } from '../core/validation';
import {
    EnvObservationTypes,
    type EnvBase,
    type EnvInfo,
    type EnvResetResult,
    type EnvStepResult,
} from '../env/base';
import type { EnvRun } from '../env/envRun';
import type { EnvKwargs } from '../env/registry';
import { RuleBaseWorker, type WorkerRunView } from '../rl/worker';
import evalsRaw from './othelloEvals.json';

// ==================== Options ====================

export const OthelloKwargsSchema = z.object({
    W: z.number().int().min(4).max(16).default(8),
    H: z.number().int().min(4).max(16).default(8),
});

export type OthelloOptions = z.infer<typeof OthelloKwargsSchema>;

const OthelloSnapshotSchema = z.object({
    W: z.number().int(),
    H: z.number().int(),
    field: z.array(z.union([z.literal(-1), z.literal(0), z.literal(1)])),
    player: z.union([z.literal(0), z.literal(1)]),
    lastAction: z.number().int().min(-1),
});

/** Positional weights per board size, row-major */
const BOARD_EVALS = z.record(z.array(z.number())).parse(evalsRaw);

const DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
    [-1, 1],
    [0, 1],
    [1, 1],
    [1, 0],
    [1, -1],
    [0, -1],
    [-1, -1],
    [-1, 0],
];

const OUTSIDE = 9;

export interface OthelloMoveResult {
    rewards: [number, number];
    done: boolean;
    info: EnvInfo;
}

function colorOf(player: number): number {
    return player === 0 ? 1 : -1;
}

// ==================== Environment ====================

export class Othello implements EnvBase<number, number[]> {
    readonly name: string;
    readonly W: number;
    readonly H: number;
    readonly actionSpace: DiscreteSpace;
    readonly observationSpace: BoxSpace;
    readonly observationType = EnvObservationTypes.DISCRETE;
    readonly playerNum = 2;
    readonly maxEpisodeSteps: number;

    private field: number[];
    private player = 0;
    private lastAction = -1;
    private validMoves: [number[], number[]] = [[], []];

    constructor(options: Partial<OthelloOptions> = {}) {
        const { W, H } = parseWithSchema(OthelloKwargsSchema, options, 'Othello options');
        this.W = W;
        this.H = H;
        this.name = W === 8 && H === 8 ? 'Othello' : `Othello${W}x${H}`;
        this.actionSpace = discrete(W * H);
        this.observationSpace = box([W * H], -1, 1);
        this.maxEpisodeSteps = W * H;
        this.field = new Array<number>(W * H).fill(0);
    }

    // ==================== Board ====================

    get currentPlayer(): number {
        return this.player;
    }

    get board(): readonly number[] {
        return this.field;
    }

    /** Stone counts: o = player 0, x = player 1 */
    counts(): { o: number; x: number } {
        let o = 0;
        let x = 0;
        for (const cell of this.field) {
            if (cell === 1) o++;
            else if (cell === -1) x++;
        }
        return { o, x };
    }

    private at(x: number, y: number): number {
        if (x < 0 || x >= this.W || y < 0 || y >= this.H) {
            return OUTSIDE;
        }
        return this.field[this.W * y + x];
    }

    /**
     * Cells flipped if `player` places a stone at `action` (empty when invalid)
     */
    flipsFor(player: number, action: number): number[] {
        if (this.field[action] !== 0) {
            return [];
        }
        const mine = colorOf(player);
        const x0 = action % this.W;
        const y0 = Math.floor(action / this.W);
        const flips: number[] = [];
        for (const [dx, dy] of DIRECTIONS) {
            const line: number[] = [];
            let x = x0 + dx;
            let y = y0 + dy;
            while (this.at(x, y) === -mine) {
                line.push(this.W * y + x);
                x += dx;
                y += dy;
            }
            if (line.length > 0 && this.at(x, y) === mine) {
                flips.push(...line);
            }
        }
        return flips;
    }

    private refreshValidMoves(): void {
        const moves: [number[], number[]] = [[], []];
        for (let a = 0; a < this.field.length; a++) {
            for (const p of [0, 1]) {
                if (this.flipsFor(p, a).length > 0) moves[p].push(a);
            }
        }
        this.validMoves = moves;
    }

    getValidActions(playerIndex: number): number[] {
        return [...this.validMoves[playerIndex]];
    }

    getInvalidActions(playerIndex: number): number[] {
        const valid = new Set(this.validMoves[playerIndex]);
        const invalid: number[] = [];
        for (let a = 0; a < this.field.length; a++) {
            if (!valid.has(a)) invalid.push(a);
        }
        return invalid;
    }

    /**
     * Place a stone for the current player. A move that flips nothing loses
     * the game for the mover.
     */
    play(action: number): OthelloMoveResult {
        const me = this.player;
        const enemy = 1 - me;
        this.lastAction = action;

        const flips = this.flipsFor(me, action);
        if (flips.length === 0) {
            return { rewards: me === 0 ? [-1, 0] : [0, -1], done: true, info: {} };
        }

        const color = colorOf(me);
        this.field[action] = color;
        for (const pos of flips) {
            this.field[pos] = color;
        }
        this.refreshValidMoves();

        const enemyCanMove = this.validMoves[enemy].length > 0;
        const meCanMove = this.validMoves[me].length > 0;
        if (!enemyCanMove && !meCanMove) {
            const { o, x } = this.counts();
            const r = o > x ? 1 : o < x ? -1 : 0;
            return { rewards: [r, -r], done: true, info: { P1: o, P2: x } };
        }
        // pass when the opponent cannot move
        if (enemyCanMove) {
            this.player = enemy;
        }
        return { rewards: [0, 0], done: false, info: {} };
    }

    // ==================== EnvBase ====================

    reset(_rng: SeededRandom): EnvResetResult<number[]> {
        this.field = new Array<number>(this.W * this.H).fill(0);
        const cx = Math.floor(this.W / 2) - 1;
        const cy = Math.floor(this.H / 2) - 1;
        this.field[this.W * cy + cx] = 1;
        this.field[this.W * (cy + 1) + cx + 1] = 1;
        this.field[this.W * cy + cx + 1] = -1;
        this.field[this.W * (cy + 1) + cx] = -1;
        this.player = 0;
        this.lastAction = -1;
        this.refreshValidMoves();
        return { state: [...this.field], nextPlayerIndex: 0 };
    }

    step(action: number, _playerIndex: number, _rng: SeededRandom): EnvStepResult<number[]> {
        const { rewards, done, info } = this.play(action);
        return { state: [...this.field], rewards, done, nextPlayerIndex: this.player, info };
    }

    backup(): JsonValue {
        return {
            W: this.W,
            H: this.H,
            field: [...this.field],
            player: this.player,
            lastAction: this.lastAction,
        };
    }

    restore(snapshot: JsonValue): void {
        const data = parseWithSchema(OthelloSnapshotSchema, snapshot, 'Othello snapshot');
        if (data.W !== this.W || data.H !== this.H || data.field.length !== this.W * this.H) {
            throw new ValidationError(`Snapshot is for a ${data.W}x${data.H} board, this board is ${this.W}x${this.H}`);
        }
        this.field = [...data.field];
        this.player = data.player;
        this.lastAction = data.lastAction;
        this.refreshValidMoves();
    }

    /** Independent board in the same position */
    clone(): Othello {
        const copy = new Othello({ W: this.W, H: this.H });
        copy.restore(this.backup());
        return copy;
    }

    actionToString(action: number): string {
        return `(${action % this.W}, ${Math.floor(action / this.W)})`;
    }

    renderTerminal(): string {
        const valid = new Set(this.validMoves[this.player]);
        const border = '-'.repeat(1 + this.W * 3);
        const lines = [border];
        for (let y = 0; y < this.H; y++) {
            let row = '|';
            for (let x = 0; x < this.W; x++) {
                const a = this.W * y + x;
                const mark = this.lastAction === a ? '*' : ' ';
                if (this.field[a] === 1) row += `${mark}o|`;
                else if (this.field[a] === -1) row += `${mark}x|`;
                else if (valid.has(a)) row += `${String(a).padStart(2)}|`;
                else row += '  |';
            }
            lines.push(row);
        }
        lines.push(border);
        const { o, x } = this.counts();
        lines.push(`O: ${o}, X: ${x}`);
        lines.push(`next player: ${this.player === 0 ? 'O' : 'X'}`);
        return lines.join('\n');
    }

    makeWorker(name: string): RuleBaseWorker | null {
        return name === 'cpu' ? createOthelloCpu() : null;
    }
}

export function createOthello(kwargs: EnvKwargs = {}): Othello {
    return new Othello(parseWithSchema(OthelloKwargsSchema, kwargs, 'Othello kwargs'));
}

// ==================== CPU Opponent ====================

const INVALID_SCORE = -999;
const WIN_SCORE = 500;

/**
 * Depth-limited negamax over board copies. Positions are explored with
 * backup()/restore() on a clone, so the live board is never touched.
 */
export class NegamaxSearch {
    private cache: Map<string, number[]> = new Map();
    /** Nodes expanded by the last search */
    lastCount = 0;
    lastScores: number[] = [];

    constructor(readonly maxDepth: number = 2) {}

    clear(): void {
        this.cache.clear();
    }

    /**
     * Best action for the player to move; ties are broken with `rng`
     */
    choose(board: Othello, rng: SeededRandom): number {
        this.lastCount = 0;
        const scores = this.search(board.clone(), 0);
        this.lastScores = scores;

        const valid = board.getValidActions(board.currentPlayer);
        if (valid.length === 0) {
            throw new ValidationError(`Player ${board.currentPlayer} has no valid move`);
        }
        const best = Math.max(...valid.map(a => scores[a]));
        return rng.choice(valid.filter(a => scores[a] === best));
    }

    /**
     * Score of every action for the player to move (INVALID_SCORE for invalid cells)
     */
    search(board: Othello, depth: number): number[] {
        const player = board.currentPlayer;
        const key = `${depth}|${player}|${board.board.join(',')}`;
        const cached = this.cache.get(key);
        if (cached) {
            return cached;
        }
        this.lastCount++;

        const saved = board.backup();
        const scores = new Array<number>(board.W * board.H).fill(INVALID_SCORE);
        for (const a of board.getValidActions(player)) {
            board.restore(saved);
            const { rewards, done } = board.play(a);
            if (done) {
                scores[a] = rewards[player] * WIN_SCORE;
            } else if (depth >= this.maxDepth) {
                const value = evaluate(board);
                scores[a] = player === 0 ? value : -value;
            } else {
                const next = this.search(board, depth + 1);
                const bestNext = Math.max(...next);
                scores[a] = board.currentPlayer === player ? bestNext : -bestNext;
            }
        }
        board.restore(saved);

        this.cache.set(key, scores);
        return scores;
    }
}

/**
 * Positional value from player 0's side (0 for sizes without a table)
 */
export function evaluate(board: Othello): number {
    const weights = BOARD_EVALS[`${board.W}x${board.H}`];
    if (!weights || weights.length !== board.board.length) {
        return 0;
    }
    return board.board.reduce((sum, cell, i) => sum + cell * weights[i], 0);
}

function originalBoard(env: EnvRun): Othello {
    const original = env.getOriginalEnv();
    if (!(original instanceof Othello)) {
        throw new TypeIncompatibilityError(`The cpu worker plays Othello, got ${env.name}`);
    }
    return original;
}

/**
 * Rule-based Othello opponent
 */
export function createOthelloCpu(maxDepth: number = 2): RuleBaseWorker {
    const search = new NegamaxSearch(maxDepth);
    return new RuleBaseWorker(
        'cpu',
        (env: EnvRun, run: WorkerRunView) => search.choose(originalBoard(env), run.rng),
        { onReset: () => search.clear() }
    );
}
