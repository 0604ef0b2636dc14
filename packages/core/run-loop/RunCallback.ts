/**
 * RunCallback - Observer interface for run lifecycle events
 *
 * Attach to a RunLoop via addCallback(). Every method is optional.
 */

import type { RunPhase, RunSummary } from '../types/Run.js';

export interface RunCallback {
    /**
     * Called after every phase transition
     */
    onPhaseChange?(from: RunPhase, to: RunPhase): void;

    /**
     * Called once a line has been written to the file and echoed to stdout
     */
    onIteration?(iteration: number, line: string): void;

    /**
     * Called when the run is done, after the sink has been released
     */
    onStop?(summary: RunSummary): void;
}
