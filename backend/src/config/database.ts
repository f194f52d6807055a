import mongoose from 'mongoose';
import { storageConfig } from './services';

export const connectDatabase = async (): Promise<void> => {
  const mongoUri = storageConfig.mongoUri;
  try {
    console.log(`🔧 Connecting to MongoDB: ${mongoUri.substring(0, 30)}...`);

    await mongoose.connect(mongoUri, {
      serverSelectionTimeoutMS: 5000,
      socketTimeoutMS: 45000,
      family: 4, // Use IPv4, skip trying IPv6
      retryWrites: true,
      maxPoolSize: 10,
      minPoolSize: 2,
    });

    mongoose.connection.on('error', (error) => {
      console.error('❌ MongoDB connection error:', error);
    });

    mongoose.connection.on('disconnected', () => {
      console.warn('⚠️ MongoDB disconnected');
    });
  } catch (error) {
    console.error('❌ Failed to connect to MongoDB:', error);
    throw error;
  }
};

export const disconnectDatabase = async (): Promise<void> => {
  await mongoose.connection.close();
};
