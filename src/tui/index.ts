// === src/tui/index.ts ===
import { getLogger } from '../core/logging/app-logger.js';
import type { LoadedLog } from '../core/logs/LogFileLoader.js';
import { ViewEngine } from '../core/viewer/ViewEngine.js';
import type { ViewerConfig } from '../core/config/schema.js';
import { keyToMsg } from './keys.js';
import { createViewerStore } from './store.js';
import { Terminal } from './terminal.js';
import { renderFrame } from './view.js';

const log = getLogger('tui');

/**
 * 이벤트 루프: key → Msg → update → 렌더.
 * 'q'/Ctrl-c로 종료되면 resolve, 처리 중 예외는 터미널을 원복한 뒤 reject.
 */
export function runViewer(loaded: LoadedLog, config: ViewerConfig, term = new Terminal()): Promise<void> {
  const engine = new ViewEngine(loaded.index, { jumpAlign: config.navigation.jumpAlign });
  const { rows, cols } = term.size();
  const store = createViewerStore(engine, {
    rows,
    cols,
    fileName: loaded.fileName,
    caseSensitive: config.search.caseSensitive,
    scrollStep: config.navigation.scrollStep,
  });

  return new Promise<void>((resolve, reject) => {
    let done = false;
    const finish = (err?: unknown) => {
      if (done) return;
      done = true;
      unsubscribe();
      term.close();
      if (err === undefined) resolve();
      else reject(err);
    };

    const unsubscribe = store.subscribe((state) => {
      if (!state.model.running) {
        log.info('quit');
        finish();
        return;
      }
      term.draw(renderFrame(state.model, engine));
    });

    const guard = (fn: () => void) => {
      try {
        fn();
      } catch (e) {
        log.error('viewer loop failed', e);
        finish(e);
      }
    };

    guard(() => {
      term.open(
        (key) =>
          guard(() => {
            const msg = keyToMsg(store.getState().model.mode, key);
            if (msg) store.getState().dispatch(msg);
          }),
        (size) => guard(() => store.getState().dispatch({ type: 'Resize', ...size })),
      );
      term.draw(renderFrame(store.getState().model, engine));
      log.info(`viewer started (${loaded.fileName}, lines=${loaded.index.lineCount})`);
    });
  });
}
