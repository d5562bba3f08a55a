// src/config/db.ts
import mongoose from 'mongoose';

const connectDB = async (mongoURI: string | undefined): Promise<void> => {
  try {
    if (!mongoURI) {
      throw new Error('MongoDB connection string is not defined');
    }

    await mongoose.connect(mongoURI);

    console.log('MongoDB Connected');
  } catch (err) {
    console.error('MongoDB connection error:', err instanceof Error ? err.message : err);
    throw err;
  }
};

export const disconnectDB = async (): Promise<void> => {
  await mongoose.connection.close();
  console.log('MongoDB connection closed');
};

export default connectDB;
