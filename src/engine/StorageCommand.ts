import { ReplyChannel } from '../common/ReplyChannel';
import { GetResult } from '../common/Types';
import { StorageStats } from '../interfaces/Storage';

export enum CommandType {
  SET = 'set',
  GET = 'get',
  DELETE = 'delete',
  STATS = 'stats',
}

export interface SetCommand {
  readonly type: CommandType.SET;
  readonly key: string;
  readonly value: Buffer;
}

export interface GetCommand {
  readonly type: CommandType.GET;
  readonly key: string;
  readonly reply: ReplyChannel<GetResult>;
}

export interface DeleteCommand {
  readonly type: CommandType.DELETE;
  readonly key: string;
}

export interface StatsCommand {
  readonly type: CommandType.STATS;
  readonly reply: ReplyChannel<StorageStats>;
}

export type StorageCommand = SetCommand | GetCommand | DeleteCommand | StatsCommand;
