import { logger as applicationLogger } from './application-logger';
import * as constants from './constants';
import ArrayBackedNamedEventQueue from './events/array-backed-named-event-queue';
import BufferedDispatcher, {
  BufferedDispatcherConfig,
  BufferedDispatcherOptions,
  DEFAULT_BUFFERED_DISPATCHER_CONFIG,
  newBufferedDispatcher,
} from './events/buffered-dispatcher';
import {
  DeliveryFailureStrategy,
  FailureAction,
  RequeueOnFailure,
  dropOnFailure,
} from './events/delivery-failure-strategy';
import EventDispatcher from './events/event-dispatcher';
import FetchTransport, { FetchTransportOptions, TransportError } from './events/fetch-transport';
import NamedEventQueue from './events/named-event-queue';
import NetworkStatusListener from './events/network-status-listener';
import QueueItem from './events/queue-item';
import Transport, { DeliveryResult } from './events/transport';
import { ActivityScope, parseActivityScope } from './identifiers/activity-scope';
import { generateId } from './identifiers/generate-id';
import IdentifierProvider, { IdentifierProviderOptions } from './identifiers/identifier-provider';
import { KVStore, MemoryStore } from './kvstore';

export {
  applicationLogger,
  constants,

  // event dispatch
  BufferedDispatcher,
  BufferedDispatcherConfig,
  BufferedDispatcherOptions,
  DEFAULT_BUFFERED_DISPATCHER_CONFIG,
  newBufferedDispatcher,
  EventDispatcher,
  NamedEventQueue,
  ArrayBackedNamedEventQueue,
  QueueItem,
  NetworkStatusListener,

  // delivery
  Transport,
  DeliveryResult,
  FetchTransport,
  FetchTransportOptions,
  TransportError,
  DeliveryFailureStrategy,
  FailureAction,
  RequeueOnFailure,
  dropOnFailure,

  // identifiers
  IdentifierProvider,
  IdentifierProviderOptions,
  ActivityScope,
  parseActivityScope,
  generateId,
  KVStore,
  MemoryStore,
};
