// CDP domain exposed by the remote browser vendor on top of the standard protocol
export {};

declare module 'playwright-core/types/protocol' {
  export namespace Protocol {
    export interface CommandParameters {
      'Captcha.waitForSolve': { detectTimeout?: number };
    }
    export interface CommandReturnValues {
      'Captcha.waitForSolve': { status: string };
    }
  }
}
