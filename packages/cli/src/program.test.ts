import { createProgram, name } from './program';

describe('cli program', () => {
  it('exports name', () => {
    expect(name).toBe('@taskplanner/cli');
  });

  it('registers the commands', () => {
    const program = createProgram();
    expect(program.name()).toBe('taskplanner');
    expect(program.commands.map((c) => c.name())).toEqual(['plan', 'show', 'serve', 'status']);
  });

  it('declares the global options', () => {
    const flags = createProgram().options.map((o) => o.long);
    expect(flags).toEqual(expect.arrayContaining(['--json', '--config', '--verbose']));
  });
});
