import { DataTypes } from 'sequelize';
import type { Sequelize, ModelStatic, Model } from 'sequelize';

export interface PartRow {
  jobId: string;
  partIndex: number;
  descriptor: unknown;
}

export type PartModel = ModelStatic<Model<PartRow, PartRow>>;

/** One row per pending part. Completing a part deletes its row. */
export function definePartModel(sequelize: Sequelize, tableName: string): PartModel {
  return sequelize.define(
    tableName,
    {
      jobId: {
        type: DataTypes.STRING(255),
        primaryKey: true,
        allowNull: false,
      },
      partIndex: {
        type: DataTypes.INTEGER,
        primaryKey: true,
        allowNull: false,
      },
      descriptor: {
        type: DataTypes.JSON,
        allowNull: false,
      },
    },
    {
      tableName,
      timestamps: false,
    },
  );
}
