export enum EventOrigins {
  Push = 'push',
  Poll = 'poll',
}
