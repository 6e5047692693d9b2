import { makeItem, makeLogin } from '../helpers.js';

/** A small export exercising enrichment, filtering, URL forms and TOTP grouping. */
export function sampleExport() {
  const fixable = makeLogin({ name: 'example.com', login_username: 'u', login_password: 'p' });
  const wwwForm = makeLogin({
    name: 'example.com', login_uri: 'https://www.example.com/', login_username: 'u', login_password: 'p', folder: 'Work',
  });
  const oldBank = makeLogin({
    name: 'Old Bank', login_uri: 'https://oldbank.test', login_username: 'x', login_password: 'y', folder: 'Finance',
  });
  const mailTotp = makeLogin({
    name: 'Mail', login_uri: 'https://mail.test', login_username: 'm', login_password: 'q', login_totp: 'JBSWY3DP', folder: 'F',
  });
  const mailPlain = makeLogin({
    name: 'Mail', login_uri: 'https://mail.test', login_username: 'm', login_password: 'q', folder: 'F',
  });
  const mailOtherTotp = makeLogin({
    name: 'Mail', login_uri: 'https://mail.test', login_username: 'm', login_password: 'q', login_totp: 'OTHER', folder: 'F',
  });
  const wifi = makeItem('note', { name: 'Wifi', notes: 'guest network' });
  const card = makeItem('card', { name: 'Visa' });

  return {
    records: [fixable, wifi, wwwForm, oldBank, mailTotp, card, mailPlain, mailOtherTotp],
    fixable, wwwForm, oldBank, mailTotp, mailPlain, mailOtherTotp, wifi, card,
  };
}
