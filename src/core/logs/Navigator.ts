// === src/core/logs/Navigator.ts ===
import { clamp } from '../../shared/utils.js';
import type { JumpAlign, ViewState } from './types.js';

export function maxTop(count: number, viewportHeight: number): number {
  return Math.max(0, count - viewportHeight);
}

function clampTop(top: number, count: number, viewportHeight: number): number {
  return clamp(Math.trunc(top), 0, maxTop(count, viewportHeight));
}

/** visible[topLine]부터 최대 viewportHeight개의 라인 인덱스 */
export function windowOf(visible: readonly number[], view: ViewState): number[] {
  const end = Math.min(visible.length, view.topLine + view.viewportHeight);
  return visible.slice(Math.min(view.topLine, end), end);
}

/** 양 끝에서 감기지 않고 클램프 */
export function scroll(view: ViewState, delta: number, count: number): ViewState {
  // NaN/±Infinity는 이동 없음
  if (!Number.isFinite(delta)) return view;
  const topLine = clampTop(view.topLine + delta, count, view.viewportHeight);
  return topLine === view.topLine ? view : { ...view, topLine };
}

export function scrollPage(view: ViewState, pages: number, count: number): ViewState {
  return scroll(view, pages * Math.max(1, view.viewportHeight), count);
}

export function scrollToTop(view: ViewState): ViewState {
  return view.topLine === 0 ? view : { ...view, topLine: 0 };
}

export function scrollToBottom(view: ViewState, count: number): ViewState {
  const topLine = maxTop(count, view.viewportHeight);
  return view.topLine === topLine ? view : { ...view, topLine };
}

/** 높이만 바꾸고 현재 위치는 가능한 유지(범위 밖이면 클램프) */
export function resize(view: ViewState, viewportHeight: number, count: number): ViewState {
  const h = Number.isFinite(viewportHeight) ? Math.max(0, Math.trunc(viewportHeight)) : view.viewportHeight;
  return { viewportHeight: h, topLine: clampTop(view.topLine, count, h) };
}

/**
 * position이 창 안에 들어오도록 topLine을 정한다.
 * 이미 보이는 위치면 움직이지 않는다.
 */
export function jumpTo(view: ViewState, position: number, count: number, align: JumpAlign): ViewState {
  if (count === 0 || !Number.isInteger(position) || position < 0 || position >= count) return view;
  const h = view.viewportHeight;
  if (h > 0 && position >= view.topLine && position < view.topLine + h) return view;
  const want = align === 'center' ? position - Math.floor(Math.max(0, h - 1) / 2) : position;
  const topLine = clampTop(want, count, h);
  return topLine === view.topLine ? view : { ...view, topLine };
}
