export enum State {
  AWAITING_MODEL = 'AWAITING_MODEL',
  AWAITING_TOOL = 'AWAITING_TOOL',
  DONE = 'DONE'
}

const TRANSITIONS: Record<State, State[]> = {
  [State.AWAITING_MODEL]: [State.AWAITING_TOOL, State.DONE],
  [State.AWAITING_TOOL]: [State.AWAITING_MODEL],
  [State.DONE]: []
};

export class FSM {
  state: State = State.AWAITING_MODEL;
  readonly trail: State[] = [State.AWAITING_MODEL];

  transition(next: State) {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`illegal agent transition ${this.state} -> ${next}`);
    }
    this.state = next;
    this.trail.push(next);
  }

  get done() {
    return this.state === State.DONE;
  }
}
