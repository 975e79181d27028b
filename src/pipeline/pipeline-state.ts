export type PipelineStage =
    | 'PENDING'
    | 'FETCHING'
    | 'EXTRACTING'
    | 'AGGREGATING'
    | 'SORTING'
    | 'LOADING'
    | 'DONE'
    | 'FAILED';

export const STAGE_ORDER: readonly PipelineStage[] = [
    'PENDING',
    'FETCHING',
    'EXTRACTING',
    'AGGREGATING',
    'SORTING',
    'LOADING',
    'DONE',
];

export interface StageTransition {
    from: PipelineStage;
    to: PipelineStage;
    at: number;
}

/**
 * Forward-only stage tracker. Each stage may only advance to the next one in
 * `STAGE_ORDER`; any non-terminal stage may fail. `DONE` and `FAILED` are
 * terminal.
 */
export class PipelineStateMachine {
    private current: PipelineStage = 'PENDING';
    private readonly history: StageTransition[] = [];

    get stage(): PipelineStage {
        return this.current;
    }

    get transitions(): readonly StageTransition[] {
        return this.history;
    }

    isTerminal(): boolean {
        return this.current === 'DONE' || this.current === 'FAILED';
    }

    advance(to: PipelineStage): StageTransition {
        if (to === 'FAILED') {
            return this.fail();
        }
        const expected = STAGE_ORDER[STAGE_ORDER.indexOf(this.current) + 1];
        if (this.isTerminal() || to !== expected) {
            throw new Error(`Illegal pipeline transition ${this.current} -> ${to}`);
        }
        return this.record(to);
    }

    fail(): StageTransition {
        if (this.isTerminal()) {
            throw new Error(`Illegal pipeline transition ${this.current} -> FAILED`);
        }
        return this.record('FAILED');
    }

    private record(to: PipelineStage): StageTransition {
        const transition: StageTransition = { from: this.current, to, at: Date.now() };
        this.current = to;
        this.history.push(transition);
        return transition;
    }
}
