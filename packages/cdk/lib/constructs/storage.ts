/**
 * Storage construct for the scan log table and the cold-archive vault
 */
import * as cdk from 'aws-cdk-lib';
import * as dynamodb from 'aws-cdk-lib/aws-dynamodb';
import * as glacier from 'aws-cdk-lib/aws-glacier';
import { Construct } from 'constructs';

export interface StorageConstructProps {
  projectName: string;
  environment: string;
}

export class StorageConstruct extends Construct {
  public readonly reportsTable: dynamodb.Table;
  public readonly archiveVault: glacier.CfnVault;
  public readonly vaultName: string;
  public readonly vaultArn: string;

  constructor(scope: Construct, id: string, props: StorageConstructProps) {
    super(scope, id);

    // Snapshot records and scan summaries, expired through the TTL attribute
    this.reportsTable = new dynamodb.Table(this, 'ReportsTable', {
      tableName: `${props.projectName}-reports-${props.environment}`,
      partitionKey: { name: 'SnapshotId', type: dynamodb.AttributeType.STRING },
      sortKey: { name: 'ProcessedAt', type: dynamodb.AttributeType.STRING },
      billingMode: dynamodb.BillingMode.PAY_PER_REQUEST,
      encryption: dynamodb.TableEncryption.AWS_MANAGED,
      timeToLiveAttribute: 'TTL',
      removalPolicy: cdk.RemovalPolicy.RETAIN,
    });

    this.vaultName = `${props.projectName}-archive-${props.environment}`;
    this.archiveVault = new glacier.CfnVault(this, 'ArchiveVault', {
      vaultName: this.vaultName,
    });
    this.archiveVault.applyRemovalPolicy(cdk.RemovalPolicy.RETAIN);
    this.vaultArn = this.archiveVault.attrArn;

    cdk.Tags.of(this.reportsTable).add('Purpose', 'Snapshot Scan Log');
    cdk.Tags.of(this.archiveVault).add('Purpose', 'Snapshot Cold Archive');
  }
}
