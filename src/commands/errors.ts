export enum DispatchErrorCode {
  NotRunnable = 'NotRunnable',
  NotDispatchable = 'NotDispatchable',
  DuplicateCommand = 'DuplicateCommand',
  NoQueue = 'NoQueue',
  UnregisteredRecord = 'UnregisteredRecord',
  UnserializableArgument = 'UnserializableArgument',
  PayloadTooLarge = 'PayloadTooLarge',
  UnknownCommand = 'UnknownCommand',
  InvalidPayload = 'InvalidPayload'
}

export class DispatchError extends Error {
  constructor(public code: DispatchErrorCode, message: string, public detail?: Record<string, unknown>) {
    super(message);
    this.name = 'DispatchError';
  }
}
