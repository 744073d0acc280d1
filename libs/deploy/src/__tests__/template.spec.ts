/**
 * ServiceTemplate tests
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { PreconditionError } from '@kneeboard/ipc';
import { ServiceTemplate } from '../service/template';

const FIXTURE = fs.readFileSync(path.join(__dirname, 'fixtures', 'kneeboard.service'), 'utf-8');

const DESCRIPTOR = {
  execPath: '/usr/bin/python3 /opt/app/app.py',
  workingDirectory: '/opt/app',
  runAsUser: 'pi',
  autostart: true,
};

describe('ServiceTemplate', () => {
  it('locates each slot', () => {
    const template = ServiceTemplate.parse(FIXTURE, 'kneeboard.service');

    expect(template.slotLines).toEqual({ ExecStart: 6, WorkingDirectory: 7, User: 8 });
  });

  it('fills the slots and leaves every other line untouched', () => {
    const rendered = ServiceTemplate.parse(FIXTURE).render(DESCRIPTOR);
    const before = FIXTURE.split('\n');
    const after = rendered.split('\n');

    expect(after).toHaveLength(before.length);
    expect(after[6]).toBe('ExecStart=/usr/bin/python3 /opt/app/app.py');
    expect(after[7]).toBe('WorkingDirectory=/opt/app');
    expect(after[8]).toBe('User=pi');
    after.forEach((line, index) => {
      if (index < 6 || index > 8) {
        expect(line).toBe(before[index]);
      }
    });
  });

  it('renders the same output when applied twice', () => {
    const once = ServiceTemplate.parse(FIXTURE).render(DESCRIPTOR);
    const twice = ServiceTemplate.parse(once).render(DESCRIPTOR);

    expect(twice).toBe(once);
  });

  it('keeps CRLF line endings on slot lines', () => {
    const text = '[Service]\r\nExecStart=old\r\nWorkingDirectory=old\r\nUser=old\r\n';

    expect(ServiceTemplate.parse(text).render(DESCRIPTOR)).toBe(
      '[Service]\r\nExecStart=/usr/bin/python3 /opt/app/app.py\r\nWorkingDirectory=/opt/app\r\nUser=pi\r\n',
    );
  });

  it('does not treat a prefixed directive as a slot', () => {
    const text = 'ExecStartPre=/bin/true\nExecStart=a\nWorkingDirectory=b\nUser=c';

    expect(ServiceTemplate.parse(text).slotLines.ExecStart).toBe(1);
  });

  it('rejects a template with a duplicated directive', () => {
    const text = `${FIXTURE}\nUser=root\n`;

    expect(() => ServiceTemplate.parse(text, 'kneeboard.service')).toThrow(
      'kneeboard.service must contain exactly one User= line (found 2)',
    );
  });

  it('rejects a template missing a directive', () => {
    const text = FIXTURE.replace('WorkingDirectory=/home/pi/pilot_kneeboard\n', '');

    expect(() => ServiceTemplate.parse(text)).toThrow(PreconditionError);
    expect(() => ServiceTemplate.parse(text)).toThrow(
      'service template must contain exactly one WorkingDirectory= line (found 0)',
    );
  });
});
