/**
 * @module envs/grid
 * @description 4x3 grid world with a goal, a hole and optional slipping
 *
 * ```
 *   x: 0 1 2 3
 * y=0  . . . G     G: +1, episode ends
 * y=1  . # . H     H: -1, episode ends; #: wall
 * y=2  S . . .     S: start
 * ```
 *
 * Every other move costs 0.04. With probability `slip` the agent moves
 * 90 degrees off its intended direction (left or right, evenly).
 */

import { z } from 'zod';
import { ValidationError } from '../core/errors';
import type { JsonValue, SeededRandom } from '../core/repro';
import { arrayDiscrete, discrete, type ArrayDiscreteSpace, type DiscreteSpace } from '../core/space';
import { parseWithSchema } from '../core/validation';
import {
    EnvObservationTypes,
    type EnvBase,
    type EnvResetResult,
    type EnvStepResult,
} from '../env/base';
import type { EnvKwargs } from '../env/registry';

// ==================== Layout ====================

export const GRID_WIDTH = 4;
export const GRID_HEIGHT = 3;

export const GridActions = {
    UP: 0,
    RIGHT: 1,
    DOWN: 2,
    LEFT: 3,
} as const;

const ACTION_NAMES = ['up', 'right', 'down', 'left'] as const;

/** [dx, dy] per action; y grows downwards */
const MOVES: ReadonlyArray<readonly [number, number]> = [
    [0, -1],
    [1, 0],
    [0, 1],
    [-1, 0],
];

const START: readonly [number, number] = [0, 2];
const WALL: readonly [number, number] = [1, 1];
const GOAL: readonly [number, number] = [3, 0];
const HOLE: readonly [number, number] = [3, 1];

export const GRID_STEP_REWARD = -0.04;
export const GRID_GOAL_REWARD = 1;
export const GRID_HOLE_REWARD = -1;

// ==================== Options ====================

export const GridKwargsSchema = z.object({
    /** Probability of moving perpendicular to the chosen direction */
    slip: z.number().min(0).max(1).default(0),
    maxEpisodeSteps: z.number().int().positive().default(50),
});

export type GridOptions = z.infer<typeof GridKwargsSchema>;

const GridSnapshotSchema = z.object({
    x: z.number().int().min(0).max(GRID_WIDTH - 1),
    y: z.number().int().min(0).max(GRID_HEIGHT - 1),
});

function same(x: number, y: number, cell: readonly [number, number]): boolean {
    return x === cell[0] && y === cell[1];
}

// ==================== Environment ====================

/**
 * Single-player grid world; the observation is the agent's [x, y]
 */
export class Grid implements EnvBase<number, number[]> {
    readonly name = 'Grid';
    readonly actionSpace: DiscreteSpace = discrete(4, ACTION_NAMES);
    readonly observationSpace: ArrayDiscreteSpace = arrayDiscrete(2, [0, 0], [GRID_WIDTH - 1, GRID_HEIGHT - 1]);
    readonly observationType = EnvObservationTypes.DISCRETE;
    readonly playerNum = 1;
    readonly maxEpisodeSteps: number;
    readonly slip: number;

    private x: number = START[0];
    private y: number = START[1];

    constructor(options: Partial<GridOptions> = {}) {
        const parsed = parseWithSchema(GridKwargsSchema, options, 'Grid options');
        this.slip = parsed.slip;
        this.maxEpisodeSteps = parsed.maxEpisodeSteps;
    }

    get position(): [number, number] {
        return [this.x, this.y];
    }

    reset(_rng: SeededRandom): EnvResetResult<number[]> {
        this.x = START[0];
        this.y = START[1];
        return { state: this.position };
    }

    step(action: number, _playerIndex: number, rng: SeededRandom): EnvStepResult<number[]> {
        let direction = action;
        if (this.slip > 0 && rng.random() < this.slip) {
            direction = (action + (rng.random() < 0.5 ? 1 : 3)) % 4;
        }

        const [dx, dy] = MOVES[direction];
        const nx = this.x + dx;
        const ny = this.y + dy;
        const blocked = nx < 0 || nx >= GRID_WIDTH || ny < 0 || ny >= GRID_HEIGHT || same(nx, ny, WALL);
        if (!blocked) {
            this.x = nx;
            this.y = ny;
        }

        if (same(this.x, this.y, GOAL)) {
            return { state: this.position, rewards: [GRID_GOAL_REWARD], done: true };
        }
        if (same(this.x, this.y, HOLE)) {
            return { state: this.position, rewards: [GRID_HOLE_REWARD], done: true };
        }
        return { state: this.position, rewards: [GRID_STEP_REWARD], done: false };
    }

    backup(): JsonValue {
        return { x: this.x, y: this.y };
    }

    restore(snapshot: JsonValue): void {
        const { x, y } = parseWithSchema(GridSnapshotSchema, snapshot, 'Grid snapshot');
        if (same(x, y, WALL)) {
            throw new ValidationError(`Grid snapshot places the agent inside the wall at (${x}, ${y})`);
        }
        this.x = x;
        this.y = y;
    }

    actionToString(action: number): string {
        return ACTION_NAMES[action] ?? String(action);
    }

    renderTerminal(): string {
        const rows: string[] = [];
        for (let y = 0; y < GRID_HEIGHT; y++) {
            let row = '';
            for (let x = 0; x < GRID_WIDTH; x++) {
                if (x === this.x && y === this.y) row += 'P';
                else if (same(x, y, WALL)) row += '#';
                else if (same(x, y, GOAL)) row += 'G';
                else if (same(x, y, HOLE)) row += 'H';
                else row += '.';
            }
            rows.push(row);
        }
        return rows.join('\n');
    }
}

export function createGrid(kwargs: EnvKwargs = {}): Grid {
    return new Grid(parseWithSchema(GridKwargsSchema, kwargs, 'Grid kwargs'));
}
