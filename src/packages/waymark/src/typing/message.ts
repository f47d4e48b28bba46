import type { AnyCommand, AnyEvent, Command, DefaultRecord, Event } from '.';

export type Message<
  Type extends string = string,
  Data extends DefaultRecord = DefaultRecord,
  MetaData extends DefaultRecord | undefined = undefined,
> = Command<Type, Data, MetaData> | Event<Type, Data, MetaData>;

export type AnyMessage = AnyEvent | AnyCommand;
