// 樓層設定
export const MIN_FLOOR = 0;
export const MAX_FLOOR = 9;

// 更新週期 (毫秒)
// All characteristic times below scale with UPDATE_PERIOD_MS / DEFAULT_UPDATE_PERIOD_MS
// when the period is shorter than the default.
export const DEFAULT_UPDATE_PERIOD_MS = 100;
export const UPDATE_PERIOD_MS = 11;
export const START_DELAY_MS = 33;

// 時間 (毫秒，未縮放)
// A real car takes about 4.4 seconds to rise one floor, measured from the
// doors starting to close on one floor to finishing opening on the next.
export const MIN_TIME_DOORS_OPEN_MS = 4567;
export const MIN_TIME_BEFORE_UN_HALT_MS = 2000;
export const TIME_TO_RISE_ONE_FLOOR_MS = 4321;
export const TIME_TO_RISE_ANOTHER_MS = 2222;
export const TIME_TO_SINK_ONE_FLOOR_MS = 3777;
export const TIME_TO_SINK_ANOTHER_MS = 1777;
export const MAX_INTER_REQUEST_TIME_MS = 1667;

// 模擬請求
export const TOTAL_REQUESTS = 24;
export const MIN_REQUESTS = 10;
export const BASE_INTER_REQUEST_TIME_MS = 357;
export const MAX_UPDATES_BEFORE_REQUEST = 7;
export const SETTLE_TIME_MS = 9876;
export const MAX_SIMULATION_CYCLES = 100_000;

// 輸出詳細程度 (0-3)
export const DEFAULT_VERBOSE = 3;
