import os from 'node:os';

const GIB = 1024 ** 3;

export interface HostStatus {
  hostname: string;
  memoryFreeGb: number;
  memoryTotalGb: number;
  memoryPercentUsed: number;
  sessionActive: boolean;
}

function roundTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Host facts for deciding where to run a large job
 */
export function getHostStatus(sessionActive: boolean): HostStatus {
  const free = os.freemem();
  const total = os.totalmem();
  return {
    hostname: os.hostname(),
    memoryFreeGb: roundTenth(free / GIB),
    memoryTotalGb: roundTenth(total / GIB),
    memoryPercentUsed: total > 0 ? roundTenth(((total - free) / total) * 100) : 0,
    sessionActive,
  };
}
