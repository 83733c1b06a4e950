import { setup, assign } from 'xstate';
import type { SnapshotFrom } from 'xstate';
import {
  FlowEvents,
  GameModes,
  Screens,
  type GameFlowState,
  type GameMode,
  type ScreenName,
  type SessionResult,
} from '@cookie-division/shared-types';

/**
 * Game Flow Machine
 *
 * Menu → (question submission) → gameplay → results. Transitions are pure;
 * every side effect is a named action with an inert default, supplied by
 * the host through `gameFlowMachine.provide({ actions })`:
 *
 * - present / dismiss: show or hide a screen (params: { screen })
 * - startGameplay / stopGameplay: create and tear down the GameplaySession
 * - persistHighScore: update-if-greater (test mode only)
 * - presentResults: hand the result and high score to the presentation layer
 * - playResultSound: victory or game-over sting (test mode only)
 */

export interface GameFlowContext {
  mode: GameMode | null;
  result: SessionResult | null;
  /** Incremented on every gameplay entry. */
  sessionId: number;
  withLoadingScreen: boolean;
}

export interface GameFlowInput {
  withLoadingScreen?: boolean;
}

export type GameFlowEvent =
  | { type: typeof FlowEvents.LOADED }
  | { type: typeof FlowEvents.PRACTICE_MODE }
  | { type: typeof FlowEvents.TEST_MODE }
  | { type: typeof FlowEvents.QUESTIONS_SUBMITTED }
  | { type: typeof FlowEvents.BACK }
  | { type: typeof FlowEvents.SESSION_ENDED; result: SessionResult }
  | { type: typeof FlowEvents.PLAY_AGAIN }
  | { type: typeof FlowEvents.MAIN_MENU };

interface ScreenParams {
  screen: ScreenName;
}

export const gameFlowMachine = setup({
  types: {
    context: {} as GameFlowContext,
    events: {} as GameFlowEvent,
    input: {} as GameFlowInput,
  },
  guards: {
    withLoadingScreen: ({ context }) => context.withLoadingScreen,
    isPractice: ({ context }) => context.mode === GameModes.PRACTICE,
  },
  actions: {
    enterPractice: assign({ mode: GameModes.PRACTICE }),
    enterTest: assign({ mode: GameModes.TEST }),
    nextSession: assign({
      sessionId: ({ context }) => context.sessionId + 1,
      result: null,
    }),
    storeResult: assign({
      result: ({ context, event }) => (event.type === FlowEvents.SESSION_ENDED ? event.result : context.result),
    }),

    present: (_, _params: ScreenParams) => {},
    dismiss: (_, _params: ScreenParams) => {},
    startGameplay: () => {},
    stopGameplay: () => {},
    persistHighScore: () => {},
    presentResults: () => {},
    playResultSound: () => {},
  },
}).createMachine({
  id: 'game-flow',
  initial: 'boot',
  context: ({ input }) => ({
    mode: null,
    result: null,
    sessionId: 0,
    withLoadingScreen: input.withLoadingScreen ?? false,
  }),
  states: {
    boot: {
      always: [
        { guard: 'withLoadingScreen', target: 'loading' },
        { target: 'mainMenu' },
      ],
    },
    loading: {
      entry: [{ type: 'present', params: { screen: Screens.LOADING } }],
      exit: [{ type: 'dismiss', params: { screen: Screens.LOADING } }],
      on: {
        [FlowEvents.LOADED]: { target: 'mainMenu' },
      },
    },
    mainMenu: {
      entry: [{ type: 'present', params: { screen: Screens.MAIN_MENU } }],
      exit: [{ type: 'dismiss', params: { screen: Screens.MAIN_MENU } }],
      on: {
        [FlowEvents.PRACTICE_MODE]: { target: 'gameplay', actions: 'enterPractice' },
        [FlowEvents.TEST_MODE]: { target: 'questionSubmission', actions: 'enterTest' },
      },
    },
    questionSubmission: {
      entry: [{ type: 'present', params: { screen: Screens.QUESTION_SUBMISSION } }],
      exit: [{ type: 'dismiss', params: { screen: Screens.QUESTION_SUBMISSION } }],
      on: {
        [FlowEvents.QUESTIONS_SUBMITTED]: { target: 'gameplay', actions: 'enterTest' },
        [FlowEvents.BACK]: { target: 'mainMenu' },
      },
    },
    gameplay: {
      entry: ['nextSession', { type: 'present', params: { screen: Screens.GAMEPLAY } }, 'startGameplay'],
      exit: ['stopGameplay', { type: 'dismiss', params: { screen: Screens.GAMEPLAY } }],
      on: {
        [FlowEvents.SESSION_ENDED]: [
          { guard: 'isPractice', target: 'practiceComplete', actions: 'storeResult' },
          { target: 'gameOver', actions: 'storeResult' },
        ],
      },
    },
    gameOver: {
      entry: [
        'persistHighScore',
        { type: 'present', params: { screen: Screens.GAME_OVER } },
        'presentResults',
        'playResultSound',
      ],
      exit: [{ type: 'dismiss', params: { screen: Screens.GAME_OVER } }],
      on: {
        [FlowEvents.PLAY_AGAIN]: { target: 'questionSubmission' },
        [FlowEvents.MAIN_MENU]: { target: 'mainMenu' },
      },
    },
    practiceComplete: {
      entry: [{ type: 'present', params: { screen: Screens.PRACTICE_COMPLETE } }, 'presentResults'],
      exit: [{ type: 'dismiss', params: { screen: Screens.PRACTICE_COMPLETE } }],
      on: {
        [FlowEvents.PLAY_AGAIN]: { target: 'gameplay', actions: 'enterPractice' },
        [FlowEvents.MAIN_MENU]: { target: 'mainMenu' },
      },
    },
  },
});

export type GameFlowSnapshot = SnapshotFrom<typeof gameFlowMachine>;

/** Projects the machine snapshot onto the public flow state. */
export function toGameFlowState(snapshot: GameFlowSnapshot): GameFlowState {
  const { context } = snapshot;

  if (snapshot.matches('loading') || snapshot.matches('boot')) return { kind: 'Loading' };
  if (snapshot.matches('questionSubmission')) return { kind: 'QuestionSubmission' };
  if (snapshot.matches('gameplay')) {
    return { kind: 'Gameplay', isPracticeMode: context.mode === GameModes.PRACTICE, sessionId: context.sessionId };
  }
  if ((snapshot.matches('gameOver') || snapshot.matches('practiceComplete')) && context.result) {
    const { finalScore, accuracy, grade, reason } = context.result;
    const kind = snapshot.matches('gameOver') ? 'GameOver' : 'PracticeComplete';
    return { kind, finalScore, accuracy, grade, reason };
  }
  return { kind: 'MainMenu' };
}
