'use client';

import {
  MAX_FLOOR,
  MIN_FLOOR,
  TIME_TO_RISE_ANOTHER_MS,
  TIME_TO_RISE_ONE_FLOOR_MS,
  TIME_TO_SINK_ANOTHER_MS,
  TIME_TO_SINK_ONE_FLOOR_MS,
  TOTAL_REQUESTS,
  UPDATE_PERIOD_MS
} from '@/constants/elevatorConfig';
import { formatLogEntry, verbosityOf } from '@/lib/eventLog';
import { runInterleavedSimulation } from '@/lib/simulation';
import type { DirectionPolicy } from '@/types/elevator.types';
import type { SimulationResult } from '@/types/simulation.types';
import { useState } from 'react';

export default function Home() {
  const [policy, setPolicy] = useState<DirectionPolicy>('early');
  const [verbose, setVerbose] = useState(2);
  const [result, setResult] = useState<SimulationResult | null>(null);

  const handleStartSimulation = () => {
    console.log('Simulation started!');
    setResult(null);
    const results = runInterleavedSimulation({ policy });
    setResult(results);
    console.log('Simulation finished!', results.report);
  };

  const visibleLogs = (result?.logs ?? []).filter(
    (entry) => verbosityOf(entry.event) <= verbose
  );

  return (
    <div className="container mx-auto flex min-h-screen flex-col items-center p-4">
      <header className="mb-8 w-full py-4">
        <h1 className="text-center font-bold text-3xl">
          Elevator Car Controller
        </h1>
      </header>

      <div className="mb-8 w-full max-w-2xl rounded-lg border bg-card p-6 shadow-sm">
        <h2 className="mb-3 font-semibold text-xl">Simulation settings</h2>
        <ul className="list-inside list-disc space-y-1 text-muted-foreground text-sm">
          <li>
            Floors {MIN_FLOOR} to {MAX_FLOOR}, one car, updated every{' '}
            {UPDATE_PERIOD_MS} ms
          </li>
          <li>
            Rising takes {TIME_TO_RISE_ONE_FLOOR_MS} ms for the first floor and{' '}
            {TIME_TO_RISE_ANOTHER_MS} ms for each further one (unscaled)
          </li>
          <li>
            Sinking takes {TIME_TO_SINK_ONE_FLOOR_MS} ms for the first floor and{' '}
            {TIME_TO_SINK_ANOTHER_MS} ms for each further one (unscaled)
          </li>
          <li>
            {TOTAL_REQUESTS} random requests, including one halt and a later
            resume
          </li>
        </ul>
        <div className="mt-4 flex flex-wrap gap-4 text-sm">
          <label className="flex items-center gap-2">
            Direction policy
            <select
              className="rounded-md border bg-background px-2 py-1"
              value={policy}
              onChange={(e) =>
                setPolicy(e.target.value === 'count' ? 'count' : 'early')
              }
            >
              <option value="early">Early decision</option>
              <option value="count">Count based</option>
            </select>
          </label>
          <label className="flex items-center gap-2">
            Verbosity
            <input
              className="w-16 rounded-md border bg-background px-2 py-1"
              type="number"
              min={0}
              max={3}
              value={verbose}
              onChange={(e) => setVerbose(Number(e.target.value))}
            />
          </label>
        </div>
      </div>

      <main className="flex w-full max-w-2xl flex-col gap-6">
        <div className="flex justify-center">
          <button
            type="button"
            className="h-10 rounded-md bg-primary px-6 font-medium text-primary-foreground text-sm shadow-xs transition-colors hover:bg-primary/90"
            onClick={handleStartSimulation}
          >
            Start simulation
          </button>
        </div>
        <div className="flex flex-col gap-2">
          <h2 className="font-semibold text-xl">Event log</h2>
          {result !== null && (
            <p className="text-muted-foreground text-sm">
              {result.updates} updates over {result.totalTime} ms,{' '}
              {result.accepted}/{result.requests.length} requests accepted.
              Finished {result.report.state} at floor{' '}
              {result.report.currentFloor} with {result.report.pendingAbove}{' '}
              requests above and {result.report.pendingBelow} below unserviced.
            </p>
          )}
          <div className="h-96 w-full overflow-y-auto rounded-md border bg-muted/40 p-4">
            <div id="log-area-content" className="flex flex-col gap-1">
              {visibleLogs.length === 0 ? (
                <p className="text-muted-foreground text-sm">
                  Press “Start simulation” to see the log...
                </p>
              ) : (
                visibleLogs.map((entry, index) => (
                  <p
                    key={index}
                    className="whitespace-pre font-mono text-muted-foreground text-sm"
                  >
                    [{entry.time}] {formatLogEntry(entry)}
                  </p>
                ))
              )}
            </div>
          </div>
        </div>
      </main>
    </div>
  );
}
