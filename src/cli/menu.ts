import { SessionState } from '../types';
import { NotAuthenticatedError, isJournalError } from '../core/errors';
import { JournalStore } from '../journal/JournalStore';
import { formatJourneySummary } from '../report/formatReport';

/**
 * Interactive Menu
 *
 * Line-oriented command loop. Each command reads its fields through the
 * prompter and prints one status line. Journal errors are reported and the
 * loop continues; anything else propagates.
 */

/** Resolves to null once input is closed */
export interface Prompter {
  ask(question: string): Promise<string | null>;
}

export type Printer = (line: string) => void;

export interface MenuContext {
  store: JournalStore;
  prompt: Prompter;
  print: Printer;
}

export interface CommandResult {
  session: SessionState;
  exit: boolean;
}

export const ANONYMOUS: SessionState = { kind: 'anonymous' };

export const MENU_LINES: readonly string[] = [
  'Practice Circles - interactive menu',
  '1. Register a new user',
  '2. Sign in',
  '3. Create a circle',
  '4. Add an insight',
  '5. Show my report',
  '0. Exit',
];

export const CATEGORY_HINT = 'explorer/intercessor/creator/leader';

type Command = (ctx: MenuContext, session: SessionState) => Promise<CommandResult>;

const stay = (session: SessionState): CommandResult => ({ session, exit: false });
const leave = (session: SessionState): CommandResult => ({ session, exit: true });

function requireSession(session: SessionState): { userId: number; handle: string } {
  if (session.kind === 'anonymous') {
    throw new NotAuthenticatedError();
  }
  return session;
}

const register: Command = async (ctx, session) => {
  const handle = await ctx.prompt.ask('Handle: ');
  if (handle === null) return leave(session);
  const address = await ctx.prompt.ask('Email address: ');
  if (address === null) return leave(session);
  const category = await ctx.prompt.ask(`Category (${CATEGORY_HINT}): `);
  if (category === null) return leave(session);

  const userId = ctx.store.users.register(handle, address, category || undefined);
  ctx.print(`✓ Registered user ${handle.trim()}`);
  // A new registration becomes the active session
  return stay({ kind: 'authenticated', userId, handle: handle.trim() });
};

const authenticate: Command = async (ctx, session) => {
  const handle = await ctx.prompt.ask('Handle: ');
  if (handle === null) return leave(session);

  const userId = ctx.store.users.authenticate(handle);
  if (userId === null) {
    ctx.print('✗ User not found');
    return stay(session);
  }
  ctx.print(`✓ Welcome ${handle.trim()}!`);
  return stay({ kind: 'authenticated', userId, handle: handle.trim() });
};

const createCircle: Command = async (ctx, session) => {
  const { userId } = requireSession(session);
  const name = await ctx.prompt.ask('Circle name: ');
  if (name === null) return leave(session);
  const description = await ctx.prompt.ask('Circle description: ');
  if (description === null) return leave(session);

  const circleId = ctx.store.circles.createCircle(name, description, userId);
  ctx.print(`✓ Circle created with id ${circleId}`);
  return stay(session);
};

const addInsight: Command = async (ctx, session) => {
  const { userId } = requireSession(session);
  const title = await ctx.prompt.ask('Insight title: ');
  if (title === null) return leave(session);
  const content = await ctx.prompt.ask('Insight content: ');
  if (content === null) return leave(session);

  ctx.store.insights.addInsight(userId, title, content);
  ctx.print(`✓ Insight added: ${title.trim()}`);
  return stay(session);
};

const showReport: Command = async (ctx, session) => {
  const { userId } = requireSession(session);
  const summary = ctx.store.users.getJourneySummary(userId);
  ctx.print('Your journey report:');
  for (const reportLine of formatJourneySummary(summary)) {
    ctx.print(reportLine);
  }
  return stay(session);
};

const exit: Command = async (ctx, session) => {
  ctx.print('Thank you for using Practice Circles!');
  return leave(session);
};

export const COMMANDS: Readonly<Record<string, Command>> = {
  '1': register,
  '2': authenticate,
  '3': createCircle,
  '4': addInsight,
  '5': showReport,
  '0': exit,
};

/**
 * Run one menu choice against the current session
 */
export async function dispatch(
  choice: string,
  session: SessionState,
  ctx: MenuContext
): Promise<CommandResult> {
  const command = COMMANDS[choice.trim()];
  if (!command) {
    ctx.print('Choose an option between 0 and 5');
    return stay(session);
  }

  try {
    return await command(ctx, session);
  } catch (error) {
    if (isJournalError(error)) {
      ctx.print(`✗ ${error.message}`);
      return stay(session);
    }
    throw error;
  }
}

/**
 * Print the menu and process choices until exit or end of input
 */
export async function runMenu(ctx: MenuContext): Promise<SessionState> {
  for (const menuLine of MENU_LINES) {
    ctx.print(menuLine);
  }

  let session: SessionState = ANONYMOUS;
  for (;;) {
    const choice = await ctx.prompt.ask('\nChoose an option (0-5): ');
    if (choice === null) {
      return session;
    }

    const result = await dispatch(choice, session, ctx);
    session = result.session;
    if (result.exit) {
      return session;
    }
  }
}
