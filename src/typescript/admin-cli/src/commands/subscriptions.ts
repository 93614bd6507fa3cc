import { Command } from 'commander';
import inquirer from 'inquirer';
import {
  createPushSubscription,
  deletePushSubscription,
  getSecret,
  getStravaCredentials,
  listPushSubscriptions,
} from '@strava-reporter/shared';

export function addSubscriptionCommands(program: Command) {
  program.command('subscriptions:list')
    .description('List the Strava push subscriptions of this application')
    .action(async () => {
      try {
        const subscriptions = await listPushSubscriptions(await getStravaCredentials());
        if (subscriptions.length === 0) {
          console.log('No push subscriptions.');
          return;
        }
        for (const sub of subscriptions) {
          console.log(`${sub.id}\t${sub.callback_url}\t${sub.created_at ?? ''}`.trimEnd());
        }
      } catch (error) {
        console.error('Failed to list subscriptions:', error);
        process.exitCode = 1;
      }
    });

  program.command('subscriptions:create <callbackUrl>')
    .description('Subscribe the webhook handler at <callbackUrl> to Strava events')
    .option('--verify-token <token>', 'Verify token (defaults to STRAVA_VERIFY_TOKEN)')
    .action(async (callbackUrl: string, options: { verifyToken?: string }) => {
      try {
        const verifyToken = options.verifyToken ?? await getSecret('STRAVA_VERIFY_TOKEN');
        const id = await createPushSubscription(await getStravaCredentials(), callbackUrl, verifyToken);
        console.log(`Created push subscription ${id} for ${callbackUrl}`);
      } catch (error) {
        console.error('Failed to create subscription:', error);
        process.exitCode = 1;
      }
    });

  program.command('subscriptions:delete <id>')
    .description('Delete a Strava push subscription')
    .option('-y, --yes', 'Skip confirmation')
    .action(async (id: string, options: { yes?: boolean }) => {
      const subscriptionId = Number(id);
      if (!Number.isInteger(subscriptionId)) {
        console.error(`Invalid subscription id: ${id}`);
        process.exitCode = 1;
        return;
      }

      try {
        if (!options.yes) {
          const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([{
            type: 'confirm',
            name: 'confirmed',
            message: `Delete push subscription ${subscriptionId}? Strava will stop sending events.`,
            default: false,
          }]);
          if (!confirmed) {
            console.log('Aborted.');
            return;
          }
        }

        await deletePushSubscription(await getStravaCredentials(), subscriptionId);
        console.log(`Deleted push subscription ${subscriptionId}`);
      } catch (error) {
        console.error('Failed to delete subscription:', error);
        process.exitCode = 1;
      }
    });
}
