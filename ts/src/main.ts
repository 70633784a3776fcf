import { Cells } from './cells';

// ---------------------------------------------------------------------------
// Browser entry: index.html provides #canvas and #overlay.
// ---------------------------------------------------------------------------

function formatStatus(cells: Cells): string {
  const s = cells.stats;
  const rate = s.stepsPerSecond > 0 ? `${s.stepsPerSecond} steps/s` : 'paused';
  return `gen ${s.generation} | ${s.liveCount} live | ${rate} | ${s.fps} fps`;
}

function main(): void {
  const canvas = document.getElementById('canvas');
  const overlay = document.getElementById('overlay');
  if (!(canvas instanceof HTMLCanvasElement)) {
    throw new Error('No <canvas id="canvas"> in the page');
  }

  const cells = Cells.create({ canvas });

  if (overlay) {
    cells.addHook('frameEnd', () => {
      overlay.textContent = formatStatus(cells);
    });
  }

  window.addEventListener('beforeunload', () => cells.destroy());
  cells.start();
}

try {
  main();
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error('Cells failed to start:', err);
  const overlay = document.getElementById('overlay');
  if (overlay) overlay.textContent = `Startup error: ${message}`;
}
