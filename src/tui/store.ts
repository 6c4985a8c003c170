// === src/tui/store.ts ===
import { createStore } from 'zustand/vanilla';

import type { ViewEngine } from '../core/viewer/ViewEngine.js';
import { type InitOptions, initModel } from './model.js';
import type { Model, Msg } from './types.js';
import { createUpdate } from './update.js';

type Actions = {
  dispatch(msg: Msg): void;
};

export type ViewerState = { model: Model } & Actions;

/** 세션마다 하나. 모듈 전역 상태를 두지 않는다. */
export function createViewerStore(engine: ViewEngine, opts: InitOptions) {
  const update = createUpdate(engine);
  return createStore<ViewerState>()((set, get) => ({
    model: initModel(engine, opts),
    dispatch(msg) {
      const prev = get().model;
      const next = update(prev, msg);
      if (next !== prev) set({ model: next });
    },
  }));
}

export type ViewerStore = ReturnType<typeof createViewerStore>;
