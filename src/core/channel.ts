// Channel state management

import type { ChannelId, ChannelState } from '../protocol/types';

export interface ChannelInfo {
  channelNumber: ChannelId;
  state: ChannelState;
  openedAt: number;
}

export class Channel {
  readonly channelNumber: ChannelId;
  readonly openedAt: number;

  private _state: ChannelState = 'open';

  constructor(channelNumber: ChannelId) {
    this.channelNumber = channelNumber;
    this.openedAt = Date.now();
  }

  get state(): ChannelState {
    return this._state;
  }

  close(): void {
    this._state = 'closed';
  }

  getInfo(): ChannelInfo {
    return {
      channelNumber: this.channelNumber,
      state: this._state,
      openedAt: this.openedAt,
    };
  }
}
