import cliProgress from 'cli-progress';
import chalk from 'chalk';
import { STAGE_ORDER, type PipelineStage } from '../pipeline/pipeline-state.js';

export interface ProgressConfig {
    title: string;
    total: number;
    format: string;
}

export interface ProgressUpdate {
    current: number;
    total?: number;
    message?: string;
    details?: Record<string, string | number>;
}

/**
 * Named cli-progress bars sharing one MultiBar on stderr.
 */
export class ProgressTracker {
    private bars: Map<string, cliProgress.SingleBar> = new Map();
    private titles: Map<string, string> = new Map();
    private multiBar: cliProgress.MultiBar;

    constructor(stream: NodeJS.WritableStream = process.stderr) {
        this.multiBar = new cliProgress.MultiBar({
            clearOnComplete: false,
            hideCursor: true,
            stream,
            barCompleteChar: '█',
            barIncompleteChar: '░',
        }, cliProgress.Presets.shades_grey);
    }

    createProgressBar(id: string, config: ProgressConfig): void {
        const bar = this.multiBar.create(config.total, 0, { status: config.title }, { format: config.format });
        this.bars.set(id, bar);
        this.titles.set(id, config.title);
    }

    updateProgress(id: string, update: ProgressUpdate): void {
        const bar = this.bars.get(id);
        if (!bar) {
            throw new Error(`Progress bar '${id}' not found`);
        }

        if (update.total) {
            bar.setTotal(update.total);
        }
        bar.update(update.current, {
            status: update.message || this.titles.get(id),
            ...update.details
        });
    }

    completeProgress(id: string, message?: string): void {
        const bar = this.bars.get(id);
        if (!bar) return;

        bar.update(bar.getTotal(), { status: message || `${this.titles.get(id)} - Complete!` });
    }

    failProgress(id: string, error: string): void {
        const bar = this.bars.get(id);
        if (!bar) return;

        bar.update({ status: chalk.red(`${this.titles.get(id)} - Failed: ${error}`) });
    }

    stop(): void {
        this.multiBar.stop();
    }
}

const STAGE_STEPS = STAGE_ORDER.length - 1;

/**
 * Terminal view of a pipeline run: one bar for the stage sequence and one
 * per dataset while it is being extracted.
 */
export class PipelineProgress {
    private tracker: ProgressTracker;
    private readonly stageBarId = 'pipeline-stages';
    private datasetBars: Map<string, string> = new Map();

    constructor(species: string, windowSize: number) {
        this.tracker = new ProgressTracker();
        this.tracker.createProgressBar(this.stageBarId, {
            title: chalk.blue(`${species} / ${windowSize}bp`),
            total: STAGE_STEPS,
            format: ` ${chalk.cyan('{status}')} {bar} | {percentage}% | stage {value}/{total}`
        });
    }

    stage(stage: PipelineStage): void {
        if (stage === 'FAILED') return;
        this.tracker.updateProgress(this.stageBarId, {
            current: STAGE_ORDER.indexOf(stage),
            message: chalk.blue(stage)
        });
    }

    datasetStarted(datasetId: string): void {
        const id = `dataset-${datasetId}`;
        this.tracker.createProgressBar(id, {
            title: chalk.yellow(datasetId),
            total: 1,
            format: ` ${chalk.yellow('{status}')} {bar} | {records} records`
        });
        this.tracker.updateProgress(id, { current: 0, details: { records: 0 } });
        this.datasetBars.set(datasetId, id);
    }

    datasetFinished(datasetId: string, records: number): void {
        const id = this.datasetBars.get(datasetId);
        if (id) {
            this.tracker.updateProgress(id, { current: 1, details: { records } });
            this.tracker.completeProgress(id, chalk.green(datasetId));
        }
    }

    complete(message?: string): void {
        this.tracker.completeProgress(this.stageBarId, message || chalk.green('DONE'));
    }

    error(error: string): void {
        this.tracker.failProgress(this.stageBarId, error);
    }

    stop(): void {
        this.tracker.stop();
    }
}
