import nodemailer from 'nodemailer';
import { SmtpMailTransport } from '../smtp';

const options = {
  host: 'smtp.example.com',
  port: 587,
  user: 'bot@example.com',
  password: 'test-secret',
  from: 'Reading Group <bot@example.com>'
};

describe('SmtpMailTransport', () => {
  function createTransporter() {
    return nodemailer.createTransport({ host: options.host, port: options.port, auth: { user: options.user, pass: options.password } });
  }

  it('sends text and HTML bodies from the configured sender', async () => {
    const transporter = createTransporter();
    const sendMail = jest.spyOn(transporter, 'sendMail').mockResolvedValue({
      envelope: { from: 'bot@example.com', to: ['reader@example.com'] },
      messageId: '<test@example.com>',
      accepted: ['reader@example.com'],
      rejected: [],
      pending: [],
      response: '250 OK'
    });

    const result = await new SmtpMailTransport(options, transporter).send({
      to: 'reader@example.com',
      subject: '[COLL] 1 new publication',
      text: 'plain',
      html: '<p>html</p>'
    });

    expect(result).toEqual({ accepted: ['reader@example.com'], rejected: [] });
    expect(sendMail).toHaveBeenCalledWith({
      from: 'Reading Group <bot@example.com>',
      to: 'reader@example.com',
      subject: '[COLL] 1 new publication',
      text: 'plain',
      html: '<p>html</p>'
    });
  });

  it('reports addresses the server rejected', async () => {
    const transporter = createTransporter();
    jest.spyOn(transporter, 'sendMail').mockResolvedValue({
      envelope: { from: 'bot@example.com', to: ['nobody@example.com'] },
      messageId: '<test@example.com>',
      accepted: [],
      rejected: [{ name: '', address: 'nobody@example.com' }],
      pending: [],
      response: '550 No such user'
    });

    const result = await new SmtpMailTransport(options, transporter).send({
      to: 'nobody@example.com',
      subject: 's',
      text: 't',
      html: 'h'
    });

    expect(result.rejected).toEqual(['nobody@example.com']);
  });

  it('closes the underlying transporter', () => {
    const transporter = createTransporter();
    const close = jest.spyOn(transporter, 'close').mockImplementation(() => undefined);

    new SmtpMailTransport(options, transporter).close();

    expect(close).toHaveBeenCalledTimes(1);
  });
});
