/**
 * Monitoring construct for CloudWatch dashboards and alarms
 */
import * as cdk from 'aws-cdk-lib';
import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as actions from 'aws-cdk-lib/aws-cloudwatch-actions';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as sns from 'aws-cdk-lib/aws-sns';
import * as subscriptions from 'aws-cdk-lib/aws-sns-subscriptions';
import { Construct } from 'constructs';

export interface MonitoringConstructProps {
  projectName: string;
  environment: string;
  alarmEmail?: string;
}

export class MonitoringConstruct extends Construct {
  public readonly dashboard: cloudwatch.Dashboard;
  public readonly alarmTopic: sns.Topic;

  constructor(scope: Construct, id: string, props: MonitoringConstructProps) {
    super(scope, id);

    this.alarmTopic = new sns.Topic(this, 'AlarmTopic', {
      displayName: `${props.projectName}-${props.environment}-alarms`,
      topicName: `${props.projectName}-${props.environment}-alarms`,
    });

    if (props.alarmEmail) {
      this.alarmTopic.addSubscription(new subscriptions.EmailSubscription(props.alarmEmail));
    }

    this.dashboard = new cloudwatch.Dashboard(this, 'Dashboard', {
      dashboardName: `${props.projectName}-${props.environment}`,
    });

    this.dashboard.addWidgets(
      new cloudwatch.TextWidget({
        markdown: `# ${props.projectName} - ${props.environment}

EBS snapshot retention scans`,
        width: 24,
        height: 2,
      })
    );
  }

  /**
   * Add invocation metrics and an error alarm for a function
   */
  addFunctionMetrics(fn: lambda.Function, label: string): cloudwatch.Alarm {
    const period = cdk.Duration.minutes(5);

    this.dashboard.addWidgets(
      new cloudwatch.GraphWidget({
        title: `${label} Invocations`,
        width: 12,
        left: [
          fn.metricInvocations({ statistic: 'Sum', period }),
          fn.metricErrors({ statistic: 'Sum', period }),
        ],
      }),
      new cloudwatch.GraphWidget({
        title: `${label} Duration`,
        width: 12,
        left: [fn.metricDuration({ statistic: 'Average', period })],
      })
    );

    const errorsAlarm = new cloudwatch.Alarm(this, `${label.replace(/\W/g, '')}ErrorsAlarm`, {
      metric: fn.metricErrors({ statistic: 'Sum', period }),
      threshold: 1,
      evaluationPeriods: 1,
      treatMissingData: cloudwatch.TreatMissingData.NOT_BREACHING,
      alarmDescription: `Alert when ${label} invocations fail`,
    });

    errorsAlarm.addAlarmAction(new actions.SnsAction(this.alarmTopic));
    return errorsAlarm;
  }
}
