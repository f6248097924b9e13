/**
 * Copyright 2025 The Lotusia Stewardship
 * Github: https://github.com/LotusiaStewardship
 * License: MIT
 */
export * from './lib/index.js'
export * from './utils/constants.js'
