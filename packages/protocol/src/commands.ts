/**
 * Command registry for the ZKTeco protocol.
 *
 * The set is closed: every code the client sends or accepts is listed here,
 * and decoding anything else fails with UnknownCommandError.
 */

import { UnknownCommandError } from '@zklink/utils/errors';

export const Command = {
  // Connection
  Connect: 1000,
  Exit: 1001,
  EnableDevice: 1002,
  DisableDevice: 1003,
  Restart: 1004,
  PowerOff: 1005,
  Sleep: 1006,
  Resume: 1007,

  // Device interaction
  CaptureFinger: 1009,
  TestTemp: 1011,
  CaptureImage: 1012,
  RefreshData: 1013,
  RefreshOption: 1014,
  TestVoice: 1017,

  // Device information
  GetVersion: 1100,
  ChangeSpeed: 1101,
  Auth: 1102,

  // Bulk data transfer
  PrepareData: 1500,
  Data: 1501,
  FreeData: 1502,

  // Database
  DbRrq: 7,
  UserWrq: 8,
  UserTempRrq: 9,
  UserTempWrq: 10,
  OptionsRrq: 11,
  OptionsWrq: 12,
  AttLogRrq: 13,
  ClearData: 14,
  ClearAttLog: 15,
  DeleteUser: 18,
  DeleteUserTemp: 19,
  ClearAdmin: 20,

  // Groups and time zones
  UserGrpRrq: 21,
  UserGrpWrq: 22,
  UserTzRrq: 23,
  UserTzWrq: 24,
  GrpTzRrq: 25,
  GrpTzWrq: 26,
  TzRrq: 27,
  TzWrq: 28,
  UlgRrq: 29,
  UlgWrq: 30,
  Unlock: 31,
  ClearAcc: 32,
  ClearOpLog: 33,
  OpLogRrq: 34,

  // Status
  GetFreeSizes: 50,
  EnableClock: 57,
  StartVerify: 60,
  StartEnroll: 61,
  CancelCapture: 62,
  StateRrq: 64,
  WriteLcd: 66,
  ClearLcd: 67,
  GetPinWidth: 69,

  // SMS and user data
  SmsWrq: 70,
  SmsRrq: 71,
  DeleteSms: 72,
  UDataWrq: 73,
  DeleteUData: 74,

  // Access control
  DoorStateRrq: 75,
  WriteMifare: 76,
  EmptyMifare: 78,

  // Clock
  GetTime: 201,
  SetTime: 202,

  // Real-time events
  RegEvent: 500,

  // Replies (device -> PC)
  AckOk: 2000,
  AckError: 2001,
  AckData: 2002,
  AckRetry: 2003,
  AckRepeat: 2004,
  AckUnauth: 2005,
  AckUnknown: 0xffff,
  AckErrorCmd: 0xfffd,
  AckErrorInit: 0xfffc,
  AckErrorData: 0xfffb,
} as const;

export type Command = (typeof Command)[keyof typeof Command];

export const UNKNOWN_COMMAND_NAME = 'CMD_UNKNOWN';

const COMMAND_NAMES: Record<Command, string> = {
  [Command.Connect]: 'CMD_CONNECT',
  [Command.Exit]: 'CMD_EXIT',
  [Command.EnableDevice]: 'CMD_ENABLEDEVICE',
  [Command.DisableDevice]: 'CMD_DISABLEDEVICE',
  [Command.Restart]: 'CMD_RESTART',
  [Command.PowerOff]: 'CMD_POWEROFF',
  [Command.Sleep]: 'CMD_SLEEP',
  [Command.Resume]: 'CMD_RESUME',
  [Command.CaptureFinger]: 'CMD_CAPTUREFINGER',
  [Command.TestTemp]: 'CMD_TEST_TEMP',
  [Command.CaptureImage]: 'CMD_CAPTUREIMAGE',
  [Command.RefreshData]: 'CMD_REFRESHDATA',
  [Command.RefreshOption]: 'CMD_REFRESHOPTION',
  [Command.TestVoice]: 'CMD_TESTVOICE',
  [Command.GetVersion]: 'CMD_GET_VERSION',
  [Command.ChangeSpeed]: 'CMD_CHANGE_SPEED',
  [Command.Auth]: 'CMD_AUTH',
  [Command.PrepareData]: 'CMD_PREPARE_DATA',
  [Command.Data]: 'CMD_DATA',
  [Command.FreeData]: 'CMD_FREE_DATA',
  [Command.DbRrq]: 'CMD_DB_RRQ',
  [Command.UserWrq]: 'CMD_USER_WRQ',
  [Command.UserTempRrq]: 'CMD_USERTEMP_RRQ',
  [Command.UserTempWrq]: 'CMD_USERTEMP_WRQ',
  [Command.OptionsRrq]: 'CMD_OPTIONS_RRQ',
  [Command.OptionsWrq]: 'CMD_OPTIONS_WRQ',
  [Command.AttLogRrq]: 'CMD_ATTLOG_RRQ',
  [Command.ClearData]: 'CMD_CLEAR_DATA',
  [Command.ClearAttLog]: 'CMD_CLEAR_ATTLOG',
  [Command.DeleteUser]: 'CMD_DELETE_USER',
  [Command.DeleteUserTemp]: 'CMD_DELETE_USERTEMP',
  [Command.ClearAdmin]: 'CMD_CLEAR_ADMIN',
  [Command.UserGrpRrq]: 'CMD_USERGRP_RRQ',
  [Command.UserGrpWrq]: 'CMD_USERGRP_WRQ',
  [Command.UserTzRrq]: 'CMD_USERTZ_RRQ',
  [Command.UserTzWrq]: 'CMD_USERTZ_WRQ',
  [Command.GrpTzRrq]: 'CMD_GRPTZ_RRQ',
  [Command.GrpTzWrq]: 'CMD_GRPTZ_WRQ',
  [Command.TzRrq]: 'CMD_TZ_RRQ',
  [Command.TzWrq]: 'CMD_TZ_WRQ',
  [Command.UlgRrq]: 'CMD_ULG_RRQ',
  [Command.UlgWrq]: 'CMD_ULG_WRQ',
  [Command.Unlock]: 'CMD_UNLOCK',
  [Command.ClearAcc]: 'CMD_CLEAR_ACC',
  [Command.ClearOpLog]: 'CMD_CLEAR_OPLOG',
  [Command.OpLogRrq]: 'CMD_OPLOG_RRQ',
  [Command.GetFreeSizes]: 'CMD_GET_FREE_SIZES',
  [Command.EnableClock]: 'CMD_ENABLE_CLOCK',
  [Command.StartVerify]: 'CMD_STARTVERIFY',
  [Command.StartEnroll]: 'CMD_STARTENROLL',
  [Command.CancelCapture]: 'CMD_CANCELCAPTURE',
  [Command.StateRrq]: 'CMD_STATE_RRQ',
  [Command.WriteLcd]: 'CMD_WRITE_LCD',
  [Command.ClearLcd]: 'CMD_CLEAR_LCD',
  [Command.GetPinWidth]: 'CMD_GET_PINWIDTH',
  [Command.SmsWrq]: 'CMD_SMS_WRQ',
  [Command.SmsRrq]: 'CMD_SMS_RRQ',
  [Command.DeleteSms]: 'CMD_DELETE_SMS',
  [Command.UDataWrq]: 'CMD_UDATA_WRQ',
  [Command.DeleteUData]: 'CMD_DELETE_UDATA',
  [Command.DoorStateRrq]: 'CMD_DOORSTATE_RRQ',
  [Command.WriteMifare]: 'CMD_WRITE_MIFARE',
  [Command.EmptyMifare]: 'CMD_EMPTY_MIFARE',
  [Command.GetTime]: 'CMD_GET_TIME',
  [Command.SetTime]: 'CMD_SET_TIME',
  [Command.RegEvent]: 'CMD_REG_EVENT',
  [Command.AckOk]: 'CMD_ACK_OK',
  [Command.AckError]: 'CMD_ACK_ERROR',
  [Command.AckData]: 'CMD_ACK_DATA',
  [Command.AckRetry]: 'CMD_ACK_RETRY',
  [Command.AckRepeat]: 'CMD_ACK_REPEAT',
  [Command.AckUnauth]: 'CMD_ACK_UNAUTH',
  [Command.AckUnknown]: 'CMD_ACK_UNKNOWN',
  [Command.AckErrorCmd]: 'CMD_ACK_ERROR_CMD',
  [Command.AckErrorInit]: 'CMD_ACK_ERROR_INIT',
  [Command.AckErrorData]: 'CMD_ACK_ERROR_DATA',
};

const COMMANDS_BY_CODE: ReadonlyMap<number, Command> = new Map(
  Object.values(Command).map((command) => [command, command])
);

/**
 * Resolve a wire code to a registered command.
 * @throws UnknownCommandError for codes outside the registry
 */
export function fromCode(code: number): Command {
  const command = COMMANDS_BY_CODE.get(code);
  if (command === undefined) {
    throw new UnknownCommandError(code);
  }
  return command;
}

export function isKnownCommand(code: number): code is Command {
  return COMMANDS_BY_CODE.has(code);
}

export function toCode(command: Command): number {
  return command;
}

/** Device -> PC reply codes */
export function isResponse(command: Command): boolean {
  switch (command) {
    case Command.AckOk:
    case Command.AckError:
    case Command.AckData:
    case Command.AckRetry:
    case Command.AckRepeat:
    case Command.AckUnauth:
    case Command.AckUnknown:
    case Command.AckErrorCmd:
    case Command.AckErrorInit:
    case Command.AckErrorData:
      return true;
    default:
      return false;
  }
}

/** PC -> device request codes */
export function isRequest(command: Command): boolean {
  return !isResponse(command);
}

export function isSuccess(command: Command): boolean {
  return command === Command.AckOk || command === Command.AckData;
}

export function isError(command: Command): boolean {
  switch (command) {
    case Command.AckError:
    case Command.AckErrorCmd:
    case Command.AckErrorInit:
    case Command.AckErrorData:
      return true;
    default:
      return false;
  }
}

/**
 * Canonical CMD_* label. Numbers outside the registry get CMD_UNKNOWN.
 */
export function commandName(code: number): string {
  return isKnownCommand(code) ? COMMAND_NAMES[code] : UNKNOWN_COMMAND_NAME;
}

/** NAME(code), as used in logs and error messages */
export function describeCommand(code: number): string {
  return `${commandName(code)}(${code})`;
}
