// === src/core/logging/perf.ts ===
import { LOG_TOTAL_CALLS_THRESHOLD } from '../../shared/const.js';

export function perfNow() {
  const [s, ns] = process.hrtime();
  return s * 1e3 + ns / 1e6;
}

export interface ProfileSample {
  timestamp: number;
  cpu: NodeJS.CpuUsage;
  memory: NodeJS.MemoryUsage;
}

export interface FunctionCall {
  name: string;
  start: number;
  duration: number;
}

export interface FunctionStats {
  count: number;
  totalTime: number;
  avgTime: number;
  maxTime: number;
}

export interface CaptureAnalysis {
  totalSamples: number;
  avgMemory: number;
  maxMemory: number;
  functionSummary: Record<string, FunctionStats>;
  slowFunctions: string[];
  insights: string[];
}

export interface CaptureResult {
  duration: number;
  samples: ProfileSample[];
  functionCalls: FunctionCall[];
  analysis: CaptureAnalysis;
}

const EMPTY_ANALYSIS: CaptureAnalysis = {
  totalSamples: 0,
  avgMemory: 0,
  maxMemory: 0,
  functionSummary: {},
  slowFunctions: [],
  insights: [],
};

export class PerformanceProfiler {
  private samples: ProfileSample[] = [];
  private interval?: NodeJS.Timeout;
  private isCapturing = false;
  private startTime = 0;
  private functionCalls: FunctionCall[] = [];
  private isEnabled = false;
  private lastCaptureResult: CaptureResult | null = null;

  public enable() {
    this.isEnabled = true;
  }

  public disable() {
    this.isEnabled = false;
  }

  /** 외부에서 OFF/ON 빠른 분기용 (측정 오버헤드 최소화) */
  public isOn(): boolean {
    return this.isEnabled;
  }

  public recordFunctionCall(name: string, start: number, duration: number) {
    if (!this.isEnabled) return;
    this.functionCalls.push({ name, start, duration });
  }

  public startCapture() {
    if (this.isCapturing || !this.isEnabled) return;
    this.isCapturing = true;
    this.samples = [];
    this.functionCalls = [];
    this.startTime = perfNow();
    this.interval = setInterval(() => {
      this.samples.push({ timestamp: perfNow(), cpu: process.cpuUsage(), memory: process.memoryUsage() });
    }, 100);
    // 샘플 타이머가 프로세스 종료를 막지 않도록
    this.interval.unref();
  }

  public stopCapture(): CaptureResult {
    if (!this.isCapturing) return this.getLastCaptureResult();
    this.isCapturing = false;
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = undefined;
    }
    const duration = perfNow() - this.startTime;
    const result: CaptureResult = {
      duration,
      samples: this.samples,
      functionCalls: this.functionCalls,
      analysis: this.analyze(),
    };
    this.lastCaptureResult = result;
    return result;
  }

  public getLastCaptureResult(): CaptureResult {
    return this.lastCaptureResult || { duration: 0, samples: [], functionCalls: [], analysis: EMPTY_ANALYSIS };
  }

  private analyze(): CaptureAnalysis {
    const functionSummary: Record<string, FunctionStats> = {};
    for (const call of this.functionCalls) {
      const s = (functionSummary[call.name] ??= { count: 0, totalTime: 0, avgTime: 0, maxTime: 0 });
      s.count++;
      s.totalTime += call.duration;
      s.maxTime = Math.max(s.maxTime, call.duration);
      s.avgTime = s.totalTime / s.count;
    }

    const memory = this.samples.map((s) => s.memory.heapUsed);
    const avgMemory = memory.length ? memory.reduce((a, b) => a + b, 0) / memory.length : 0;
    const maxMemory = memory.length ? Math.max(...memory) : 0;

    // 평균보다 2배 이상 느린 함수
    const stats = Object.values(functionSummary);
    const overallAvg = stats.length ? stats.reduce((a, s) => a + s.avgTime, 0) / stats.length : 0;
    const slowFunctions = Object.entries(functionSummary)
      .filter(([, s]) => s.avgTime > overallAvg * 2)
      .map(([name]) => name);

    const insights: string[] = [];
    if (slowFunctions.length > 0) insights.push(`병목 함수들: ${slowFunctions.join(', ')}`);
    if (maxMemory > avgMemory * 1.5) insights.push('메모리 사용량이 높음');
    const totalCalls = stats.reduce((sum, s) => sum + s.count, 0);
    if (totalCalls > LOG_TOTAL_CALLS_THRESHOLD) insights.push('함수 호출 수가 많음 - 캐싱 고려');

    return { totalSamples: this.samples.length, avgMemory, maxMemory, functionSummary, slowFunctions, insights };
  }
}

export const globalProfiler = new PerformanceProfiler();

// Decorator for class methods (legacy decorators)
export function measure(name?: string) {
  return function (_target: object, propertyKey: string, descriptor: PropertyDescriptor) {
    const originalMethod: unknown = descriptor.value;
    if (typeof originalMethod !== 'function') return descriptor;
    const funcName = name || propertyKey;
    descriptor.value = function (this: unknown, ...args: unknown[]) {
      // 🔴 OFF: 측정 없이 즉시 원본 실행 → 타이머 호출 0회
      if (!globalProfiler.isOn()) return originalMethod.apply(this, args);
      // 🟢 ON: 타이머 & 기록
      return measureBlock(funcName, () => originalMethod.apply(this, args));
    };
    return descriptor;
  };
}

// 오버로드: 동기 함수면 T, 비동기면 Promise<T>를 반환하도록 타입 보존
export function measureBlock<T>(name: string, fn: () => Promise<T>): Promise<T>;
export function measureBlock<T>(name: string, fn: () => T): T;
export function measureBlock<T>(name: string, fn: () => T | Promise<T>): T | Promise<T> {
  if (!globalProfiler.isOn()) return fn();
  const t0 = perfNow();
  try {
    const r = fn();
    if (r instanceof Promise) {
      return r.finally(() => globalProfiler.recordFunctionCall(name, t0, perfNow() - t0));
    }
    globalProfiler.recordFunctionCall(name, t0, perfNow() - t0);
    return r;
  } catch (e) {
    globalProfiler.recordFunctionCall(name, t0, perfNow() - t0);
    throw e;
  }
}
