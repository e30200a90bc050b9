import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { withSession } from '../../core/session.js';
import { cliLog, fail, formatFact, success } from '../ui.js';

export const factCommand = new Command('fact')
  .description('Add a canonical fact (immutable lore)')
  .argument('<id>', 'Unique fact id')
  .argument('<content...>', 'The fact')
  .option('-d, --domain <domain>', 'Domain such as lore, geography or history')
  .addHelpText('after', `
${chalk.bold('Examples:')}
  ${chalk.cyan('recall fact')} king_name "The king is Aldric" ${chalk.gray('--domain lore')}
`)
  .action((id, content, options) => {
    try {
      const fact = withSession(
        (session) => session.store.addCanonicalFact(id, content.join(' '), options.domain, 'designer'),
        { mutate: true, onLog: cliLog }
      );

      console.log(success('Canonical fact added'));
      console.log(`   ${formatFact(fact)}`);
    } catch (err) {
      fail(err);
    }
  });
