/**
 * @pgnreplay/test-utils
 *
 * PGN fixtures shared by the test suites
 */

// Fixture loading
export { loadPgnSync, getFixturePath, listPgnFixtures } from './fixtures/loader.js';

export { loadGamesSync, loadGameSync } from './fixtures/games.js';
