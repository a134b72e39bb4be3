import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface JobRow {
  id: string;
  total: number;
  remaining: number;
  failed: boolean | number;
  failureReason: string | null;
  metadata: unknown;
  topic: string | null;
  registeredAt: number | string;
}

export type JobModel = ModelStatic<Model>;

export function defineJobModel(sequelize: Sequelize, tableName: string): JobModel {
  return sequelize.define(
    tableName,
    {
      id: {
        type: DataTypes.STRING(255),
        primaryKey: true,
        allowNull: false,
      },
      total: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      remaining: {
        type: DataTypes.INTEGER,
        allowNull: false,
      },
      failed: {
        type: DataTypes.BOOLEAN,
        allowNull: false,
        defaultValue: false,
      },
      failureReason: {
        type: DataTypes.TEXT,
        allowNull: true,
      },
      metadata: {
        type: DataTypes.JSON,
        allowNull: false,
        defaultValue: {},
      },
      topic: {
        type: DataTypes.STRING(255),
        allowNull: true,
      },
      registeredAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
    },
    {
      tableName,
      timestamps: false,
      indexes: [{ fields: ['registeredAt', 'id'] }],
    },
  );
}
