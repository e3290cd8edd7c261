import { ValidationError } from "../errors.ts";

export interface CpuLimits {
  cpuRequest: string;
  cpuLimit: string;
  /** Set when the requested burst had to be raised */
  warning?: string;
}

/**
 * Converts a Kubernetes CPU quantity ("250m", "1", "1.5") to cores.
 */
export function parseCpu(quantity: string): number {
  const trimmed = quantity.trim();
  const match = /^(\d+(?:\.\d+)?)(m?)$/.exec(trimmed);
  if (match === null) {
    throw new ValidationError(`Invalid CPU quantity '${quantity}'`);
  }
  const value = Number(match[1]);
  return match[2] === "m" ? value / 1000 : value;
}

/**
 * A limit lower than the request would be refused by the cluster, so the
 * limit is raised to the request.
 */
export function validateCpuAndBurst(totalCpus: string, cpuBurst: string): CpuLimits {
  const request = parseCpu(totalCpus);
  const burst = parseCpu(cpuBurst);

  if (burst < request) {
    return {
      cpuRequest: totalCpus,
      cpuLimit: totalCpus,
      warning: `CPU burst ${cpuBurst} is lower than the CPU request ${totalCpus}, using ${totalCpus} as CPU limit`,
    };
  }
  return { cpuRequest: totalCpus, cpuLimit: cpuBurst };
}
