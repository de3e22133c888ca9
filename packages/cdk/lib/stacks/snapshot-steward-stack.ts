/**
 * Main Snapshot Steward stack
 */
import * as cdk from 'aws-cdk-lib';
import * as events from 'aws-cdk-lib/aws-events';
import * as targets from 'aws-cdk-lib/aws-events-targets';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { Construct } from 'constructs';
import { MonitoringConstruct, StorageConstruct } from '../constructs';

export interface SnapshotStewardStackProps extends cdk.StackProps {
  projectName: string;
  environment: string;
  /** Bundled handler code exposing the handlers from `@snapshot-steward/lambda` */
  lambdaCode: lambda.Code;
  scanRegions?: string[];
  retentionDays?: number;
  enableAutoDelete?: boolean;
  enableColdArchive?: boolean;
  snapshotCostPerGb?: number;
  smtpUser?: string;
  alertReceiver?: string;
  smtpPasswordSecretName?: string;
  alarmEmail?: string;
}

export class SnapshotStewardStack extends cdk.Stack {
  public readonly scanFunction: lambda.Function;

  constructor(scope: Construct, id: string, props: SnapshotStewardStackProps) {
    super(scope, id, props);

    const { projectName, environment } = props;
    const secretName = props.smtpPasswordSecretName ?? `${projectName}/smtp-password`;

    const storage = new StorageConstruct(this, 'Storage', { projectName, environment });

    const monitoring = new MonitoringConstruct(this, 'Monitoring', {
      projectName,
      environment,
      alarmEmail: props.alarmEmail,
    });

    const sharedEnvironment: Record<string, string> = {
      DYNAMODB_TABLE_NAME: storage.reportsTable.tableName,
      GLACIER_VAULT_NAME: storage.vaultName,
      RETENTION_DAYS: String(props.retentionDays ?? 90),
      LOG_LEVEL: environment === 'production' ? 'INFO' : 'DEBUG',
    };

    this.scanFunction = this.createFunction('ScanFunction', {
      name: `${projectName}-scan-${environment}`,
      handler: 'index.scanSnapshotsHandler',
      code: props.lambdaCode,
      timeout: cdk.Duration.minutes(15),
      environment: {
        ...sharedEnvironment,
        ENABLE_AUTO_DELETE: String(props.enableAutoDelete ?? false),
        ENABLE_COLD_ARCHIVE: String(props.enableColdArchive ?? false),
        SCAN_REGIONS: (props.scanRegions ?? [this.region]).join(','),
        SNAPSHOT_COST_PER_GB: String(props.snapshotCostPerGb ?? 0.05),
        SMTP_USER: props.smtpUser ?? '',
        ALERT_RECEIVER: props.alertReceiver ?? '',
        SMTP_PASSWORD_SECRET: secretName,
      },
    });

    const retrieveFunction = this.createFunction('RetrieveArchiveFunction', {
      name: `${projectName}-retrieve-archive-${environment}`,
      handler: 'index.retrieveArchiveHandler',
      code: props.lambdaCode,
      timeout: cdk.Duration.minutes(1),
      environment: sharedEnvironment,
    });

    const listExpiredFunction = this.createFunction('ListExpiredFunction', {
      name: `${projectName}-list-expired-${environment}`,
      handler: 'index.listExpiredSnapshotsHandler',
      code: props.lambdaCode,
      timeout: cdk.Duration.minutes(5),
      environment: sharedEnvironment,
    });

    // Scan permissions
    storage.reportsTable.grantWriteData(this.scanFunction);
    this.scanFunction.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ['ec2:DescribeSnapshots'],
        resources: ['*'],
      })
    );

    if (props.enableAutoDelete) {
      this.scanFunction.addToRolePolicy(
        new iam.PolicyStatement({
          actions: ['ec2:DeleteSnapshot'],
          resources: [`arn:${this.partition}:ec2:*::snapshot/*`],
        })
      );
    }

    if (props.enableColdArchive) {
      this.scanFunction.addToRolePolicy(
        new iam.PolicyStatement({
          actions: ['glacier:UploadArchive'],
          resources: [storage.vaultArn],
        })
      );
    }

    secretsmanager.Secret.fromSecretNameV2(this, 'SmtpPassword', secretName).grantRead(
      this.scanFunction
    );

    retrieveFunction.addToRolePolicy(
      new iam.PolicyStatement({
        actions: ['glacier:InitiateJob'],
        resources: [storage.vaultArn],
      })
    );

    storage.reportsTable.grantReadData(listExpiredFunction);

    // Daily scan at 06:00 UTC
    new events.Rule(this, 'ScanSchedule', {
      ruleName: `${projectName}-${environment}-schedule`,
      schedule: events.Schedule.cron({ minute: '0', hour: '6' }),
      targets: [new targets.LambdaFunction(this.scanFunction)],
    });

    monitoring.addFunctionMetrics(this.scanFunction, 'Snapshot Scan');

    // Outputs
    new cdk.CfnOutput(this, 'ScanFunctionName', {
      value: this.scanFunction.functionName,
      description: 'Snapshot scan function name',
    });

    new cdk.CfnOutput(this, 'ReportsTableName', {
      value: storage.reportsTable.tableName,
      description: 'Scan log table name',
    });

    new cdk.CfnOutput(this, 'ArchiveVaultName', {
      value: storage.vaultName,
      description: 'Cold-archive vault name',
    });

    new cdk.CfnOutput(this, 'DashboardUrl', {
      value: `https://console.aws.amazon.com/cloudwatch/home?region=${this.region}#dashboards:name=${monitoring.dashboard.dashboardName}`,
      description: 'CloudWatch dashboard URL',
    });
  }

  private createFunction(
    id: string,
    options: {
      name: string;
      handler: string;
      code: lambda.Code;
      timeout: cdk.Duration;
      environment: Record<string, string>;
    }
  ): lambda.Function {
    const logGroup = new logs.LogGroup(this, `${id}Logs`, {
      logGroupName: `/aws/lambda/${options.name}`,
      retention: logs.RetentionDays.ONE_MONTH,
      removalPolicy: cdk.RemovalPolicy.DESTROY,
    });

    return new lambda.Function(this, id, {
      functionName: options.name,
      runtime: lambda.Runtime.NODEJS_20_X,
      handler: options.handler,
      code: options.code,
      timeout: options.timeout,
      memorySize: 256,
      logGroup,
      environment: options.environment,
    });
  }
}
