import { ParseError } from '../errors';
import { columnSpans, sliceColumns, splitTable, type SplitTable } from './table';

export interface CpuUsage {
  usage: number;
}

export interface MemoryUsage {
  usedRam: number;
  /** Reported as used + free, i.e. the device's total memory. */
  availableRam: number;
}

export interface TemperatureSensor {
  isAlert: boolean;
  isCritical: boolean;
  temperature: number;
}

export interface PowerSupply {
  status: boolean;
  output: number;
  capacity: number;
}

export interface Fan {
  status: boolean;
}

export interface EnvironmentFacts {
  cpu: Record<number, CpuUsage>;
  memory: MemoryUsage;
  temperature: Record<string, TemperatureSensor>;
  power: Record<string, PowerSupply>;
  fans: Record<string, Fan>;
}

/** Key used for subsystems the device does not report. */
export const NOT_AVAILABLE = 'invalid';

export const UNAVAILABLE_TEMPERATURE: TemperatureSensor = { isAlert: false, isCritical: false, temperature: -1.0 };
export const UNAVAILABLE_POWER: PowerSupply = { status: true, output: -1.0, capacity: -1.0 };
export const UNAVAILABLE_FAN: Fan = { status: true };

// ['Total', 'CPU', 'Utilization', '<5 secs>', '<60 secs>', '<300 secs>']
const ONE_MINUTE_TOKEN = 4;

/**
 * Parses `show process cpu`:
 *
 *   status      bytes
 *   ------ ----------
 *     free  170642152
 *    alloc  298144912
 *   ...
 *    Total CPU Utilization                 9.26%      9.75%      9.72%
 */
export function parseProcessCpu(output: string): { cpu: Record<number, CpuUsage>; memory: MemoryUsage } {
  let usage = 0.0;
  let used: number | undefined;
  let free: number | undefined;

  for (const line of output.replace(/\r/g, '').split('\n')) {
    const tokens = line.trim().split(/\s+/);
    if (line.includes('Total CPU Utilization')) {
      const token = tokens[ONE_MINUTE_TOKEN];
      const value = token ? parseFloat(token.replace(/%$/, '')) : NaN;
      if (Number.isNaN(value)) {
        throw new ParseError('Total CPU Utilization', `unreadable line '${line.trim()}'`);
      }
      usage = value;
    } else if (tokens[0] === 'alloc') {
      used = parseMemoryValue(tokens[1], 'alloc');
    } else if (tokens[0] === 'free') {
      free = parseMemoryValue(tokens[1], 'free');
    }
  }

  if (used === undefined || free === undefined) {
    throw new ParseError('memory', 'alloc/free lines missing from process cpu output');
  }

  return {
    cpu: { 0: { usage } },
    memory: { usedRam: used, availableRam: used + free },
  };
}

function parseMemoryValue(value: string | undefined, field: string): number {
  if (!value || !/^\d+$/.test(value)) {
    throw new ParseError(field, `'${value ?? ''}' is not a byte count`);
  }
  return parseInt(value, 10);
}

const ALERT_FREE_STATES = ['good', 'normal'];
const CRITICAL_STATES = ['critical', 'shutdown'];

/**
 * Parses `show system temperature`:
 *
 *   Unit     Sensor  Description       Temp (C)    State           Max_Temp (C)
 *   ----     ------  ----------------  ----------  --------------  --------------
 *   1        1       MAC               37          Good            42
 *
 * Output without a sensor table yields the single "invalid" placeholder.
 */
export function parseTemperature(output: string): Record<string, TemperatureSensor> {
  let table: SplitTable;
  try {
    table = splitTable(output, 'system temperature');
  } catch (e) {
    if (e instanceof ParseError) return { [NOT_AVAILABLE]: { ...UNAVAILABLE_TEMPERATURE } };
    throw e;
  }
  if (table.rows.length === 0) return { [NOT_AVAILABLE]: { ...UNAVAILABLE_TEMPERATURE } };

  // Descriptions may contain spaces, so cut at the delimiter's columns
  const spans = columnSpans(table.delimiter);
  if (spans.length < 5) {
    throw new ParseError('system temperature', `expected at least 5 columns, got ${spans.length}`);
  }

  const sensors: Record<string, TemperatureSensor> = {};
  for (const row of table.rows) {
    const [unit, , description, temp, state] = sliceColumns(row, spans);
    const temperature = parseFloat(temp);
    if (Number.isNaN(temperature)) {
      throw new ParseError('temperature', `'${temp}' is not a temperature`);
    }
    const normalizedState = state.toLowerCase();
    sensors[`${unit}/${description}`] = {
      isAlert: !ALERT_FREE_STATES.includes(normalizedState),
      isCritical: CRITICAL_STATES.includes(normalizedState),
      temperature,
    };
  }
  return sensors;
}

export function buildEnvironment(processCpu: string, systemTemperature: string): EnvironmentFacts {
  const { cpu, memory } = parseProcessCpu(processCpu);
  return {
    cpu,
    memory,
    temperature: parseTemperature(systemTemperature),
    // Power supply and fan telemetry are not exposed by the CLI
    power: { [NOT_AVAILABLE]: { ...UNAVAILABLE_POWER } },
    fans: { [NOT_AVAILABLE]: { ...UNAVAILABLE_FAN } },
  };
}
