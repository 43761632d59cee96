import { Command, CommandSpec } from './Command';
import { MockChannel } from './MockChannel';
import { FakeClient, FakeTransport, createFakeClient, createFakeTransport } from './fakes';
import { ExpectationMismatchError, HarnessConfigurationError, HarnessUsageError } from './errors';

/**
 * Expected connection target. Unset fields accept any value.
 */
export interface SessionTarget {
  host?: string;
  user?: string;
  port?: number;
}

/**
 * Either explicit `commands`, or the CommandSpec fields of a single
 * anonymous command, never both
 */
export interface SessionOptions extends SessionTarget, CommandSpec {
  commands?: Command[];
}

const SHORTHAND_FIELDS = ['cmd', 'out', 'err', 'in', 'exit', 'waits'] as const;

interface GeneratedMocks {
  client: FakeClient;
  transport: FakeTransport;
  channels: MockChannel[];
}

/**
 * A mock remote session: one connection and one or more command executions.
 *
 * Connections must happen in the order sessions are declared, and commands
 * within a session in the order they are listed.
 */
export class Session {
  readonly host: string | undefined;
  readonly user: string | undefined;
  readonly port: number | undefined;
  readonly commands: readonly Command[];

  private mocks: GeneratedMocks | null = null;

  constructor(options: SessionOptions = {}) {
    const { host, user, port, commands, ...shorthand } = options;
    const given = SHORTHAND_FIELDS.filter((field) => shorthand[field] !== undefined);

    if (commands && given.length > 0) {
      throw new HarnessConfigurationError(
        `Session got both 'commands' and single-command fields (${given.join(', ')}); use one or the other`
      );
    }
    if (commands && commands.length === 0) {
      throw new HarnessConfigurationError("Session 'commands' must not be empty");
    }

    this.host = host;
    this.user = user;
    this.port = port;
    this.commands = commands ? [...commands] : [new Command(shorthand)];
  }

  /**
   * Session with a single command
   */
  static forCommand(target: SessionTarget, spec: CommandSpec = {}): Session {
    return new Session({ ...target, ...spec });
  }

  /**
   * Session running several commands, in order
   */
  static forCommands(target: SessionTarget, commands: Array<Command | CommandSpec>): Session {
    return new Session({
      ...target,
      commands: commands.map((command) => (command instanceof Command ? command : new Command(command))),
    });
  }

  /**
   * Build a fake client, its transport, and one channel per command.
   * Calling it again discards the previous fakes.
   */
  generateMocks(): void {
    const channels = this.commands.map((command) => new MockChannel(command));
    const transport = createFakeTransport(channels);
    const client = createFakeClient(transport);
    this.mocks = { client, transport, channels };
  }

  get client(): FakeClient {
    return this.generated().client;
  }

  get transport(): FakeTransport {
    return this.generated().transport;
  }

  get channels(): MockChannel[] {
    return this.generated().channels;
  }

  /**
   * Assert the fakes were used exactly as declared
   *
   * @param index - position of this session, used in failure messages
   * @throws ExpectationMismatchError naming the first unmet expectation
   */
  verify(index = 0): void {
    const { client, transport, channels } = this.generated();
    const check = (expectation: string, assertion: () => void): void => {
      try {
        assertion();
      } catch (error) {
        throw new ExpectationMismatchError(index, expectation, error instanceof Error ? error : new Error(String(error)));
      }
    };

    check('getTransport', () => {
      expect(client.getTransport).toHaveBeenCalledTimes(1);
      expect(client.getTransport).toHaveBeenCalledWith();
    });

    check('connect', () => {
      expect(client.connect).toHaveBeenCalledTimes(1);
      expect(client.connect).toHaveBeenCalledWith(
        expect.objectContaining({
          host: this.host ?? expect.anything(),
          username: this.user ?? expect.anything(),
          port: this.port ?? expect.anything(),
        })
      );
    });

    this.commands.forEach((command, i) => {
      const channel = channels[i];
      check(`exec[${i}]`, () => {
        expect(channel.exec).toHaveBeenLastCalledWith(command.cmd ?? expect.anything());
      });
      if (command.in !== undefined) {
        const expected = command.in;
        check(`stdin[${i}]`, () => {
          expect(channel.stdin).toEqual(expected);
        });
      }
    });

    check('openSession', () => {
      expect(transport.openSession.mock.calls).toEqual(this.commands.map(() => []));
    });
  }

  private generated(): GeneratedMocks {
    if (!this.mocks) {
      throw new HarnessUsageError('Session mocks have not been generated; call generateMocks() or start the harness first');
    }
    return this.mocks;
  }
}
